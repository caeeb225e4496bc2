import { categoryRecordsSchema, type CategoryRecord } from '../schemas/category-schemas';

/**
 * Tree form of a category record. Children are referenced by id and
 * resolved through the arena that owns every node of one render call.
 */
export interface CategoryNode {
  id: string;
  name: string;
  parentId: string | null;
  emailCount: number;
  children: string[];
}

export interface CategoryTree {
  nodes: ReadonlyMap<string, CategoryNode>;
  roots: string[];
}

export const INBOX_NODE_ID = 'inbox';

export const EMPTY_INBOX_DIAGRAM = '```mermaid\ngraph TD\n    inbox[Inbox - No categories yet]\n```';

const DIAGRAM_STYLE_LINES = [
  '',
  '    classDef inboxStyle fill:#4A90E2,stroke:#2E5C8A,color:#fff',
  '    class inbox inboxStyle',
];

/**
 * Build the category forest from a flat record list.
 *
 * A record whose parent_id does not resolve to another record becomes a root.
 * Children and roots keep input order.
 */
export function buildCategoryTree(records: readonly CategoryRecord[]): CategoryTree {
  const nodes = new Map<string, CategoryNode>();

  for (const record of records) {
    // Duplicate ids: later fields win, first position is kept
    nodes.set(record.id, {
      id: record.id,
      name: record.name,
      parentId: record.parent_id,
      emailCount: record.email_count,
      children: [],
    });
  }

  const roots: string[] = [];
  for (const node of nodes.values()) {
    const parent = node.parentId !== null ? nodes.get(node.parentId) : undefined;
    if (parent) {
      parent.children.push(node.id);
    } else {
      roots.push(node.id);
    }
  }

  return { nodes, roots };
}

export function formatNodeLabel(name: string, emailCount: number): string {
  const label = name.replace(/"/g, '#quot;');
  return emailCount > 0 ? `${label} (${emailCount})` : label;
}

/**
 * Emit one node and its subtree, pre-order. Returns the mermaid id given to
 * the node and the next free counter value.
 */
function emitNode(
  tree: CategoryTree,
  id: string,
  counter: number,
  lines: string[],
): { nodeId: string; next: number } {
  const node = tree.nodes.get(id);
  if (!node) return { nodeId: '', next: counter };

  const nodeId = `node${counter}`;
  let next = counter + 1;

  lines.push(`    ${nodeId}["${formatNodeLabel(node.name, node.emailCount)}"]`);

  for (const childId of node.children) {
    const child = emitNode(tree, childId, next, lines);
    next = child.next;
    lines.push(`    ${nodeId} --> ${child.nodeId}`);
  }

  return { nodeId, next };
}

/**
 * Render category records as a fenced Mermaid `graph TD` block rooted at a
 * synthetic Inbox node. Counts are shown per category and never summed
 * into parents.
 */
export function renderCategoryDiagram(records: readonly CategoryRecord[]): string {
  if (records.length === 0) {
    return EMPTY_INBOX_DIAGRAM;
  }

  const tree = buildCategoryTree(records);
  const lines = ['```mermaid', 'graph TD', `    ${INBOX_NODE_ID}["📬 Inbox"]`];

  let counter = 0;
  for (const rootId of tree.roots) {
    const root = emitNode(tree, rootId, counter, lines);
    counter = root.next;
    lines.push(`    ${INBOX_NODE_ID} --> ${root.nodeId}`);
  }

  lines.push(...DIAGRAM_STYLE_LINES, '```');

  return lines.join('\n');
}

/**
 * Validate raw category data and render it.
 * Throws a ZodError when the input is not a list of objects.
 */
export function generateInboxDiagram(categories: unknown): string {
  return renderCategoryDiagram(categoryRecordsSchema.parse(categories));
}
