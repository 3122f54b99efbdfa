import { parseDocument, isSeq, isMap } from 'yaml';
import { readFile, writeFile } from 'node:fs/promises';
import { RuleTableSchema, type ClassificationRule } from '@card-ledger/shared';
import { isNotFound } from '../utils/files.js';
import { formatIssues } from '../workspace/config.js';

/**
 * Stage given to groups created by appendRuleToGroup.
 */
const NEW_GROUP_STAGE = 'identity';

/**
 * Appends a classification rule to a group of a YAML rule table while
 * preserving comments and anchors.
 *
 * When the file does not exist it starts as a copy of `templatePath`. A
 * group id not yet in the table becomes a new identity group, placed
 * before the first derived group.
 *
 * @throws Error when the file has no `groups` list or the result does not
 *         validate
 */
export async function appendRuleToGroup(
    filePath: string,
    templatePath: string,
    groupId: string,
    rule: ClassificationRule
): Promise<void> {
    let content: string;
    try {
        content = await readFile(filePath, 'utf8');
    } catch (err) {
        if (!isNotFound(err)) {
            throw err;
        }
        content = await readFile(templatePath, 'utf8');
    }

    const doc = parseDocument(content);
    const groups = doc.get('groups');
    if (!isSeq(groups)) {
        throw new Error(`Invalid YAML structure in ${filePath}: "groups" must be a list.`);
    }

    const group = groups.items.find((item) => isMap(item) && item.get('id') === groupId);

    if (isMap(group)) {
        const rules = group.get('rules');
        if (isSeq(rules)) {
            rules.add(doc.createNode(rule));
        } else {
            group.set('rules', doc.createNode([rule]));
        }
    } else {
        const firstDerived = groups.items.findIndex((item) => isMap(item) && item.get('stage') === 'derived');
        const node = doc.createNode({ id: groupId, stage: NEW_GROUP_STAGE, rules: [rule] });
        if (firstDerived === -1) {
            groups.add(node);
        } else {
            groups.items.splice(firstDerived, 0, node);
        }
    }

    const check = RuleTableSchema.safeParse(doc.toJS());
    if (!check.success) {
        throw new Error(`Rule table would be invalid: ${formatIssues(check.error)}`);
    }

    await writeFile(filePath, doc.toString());
}
