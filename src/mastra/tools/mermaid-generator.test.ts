import { describe, expect, it } from 'vitest';
import type { CategoryRecord } from '../schemas/category-schemas';
import {
  EMPTY_INBOX_DIAGRAM,
  buildCategoryTree,
  formatNodeLabel,
  generateInboxDiagram,
  renderCategoryDiagram,
} from './mermaid-generator';

const category = (
  id: string,
  name: string,
  parentId: string | null,
  emailCount: number,
): CategoryRecord => ({ id, name, parent_id: parentId, email_count: emailCount });

const sampleCategories: CategoryRecord[] = [
  category('1', 'Work', null, 45),
  category('2', 'Project Alpha', '1', 20),
  category('3', 'Project Beta', '1', 15),
  category('4', 'Hockey', null, 30),
  category('5', 'Team A', '4', 18),
];

function nodeLines(diagram: string): string[] {
  return diagram.split('\n').filter(line => /^ {4}node\d+\["/.test(line));
}

function edgeLines(diagram: string): string[] {
  return diagram.split('\n').filter(line => line.includes(' --> '));
}

describe('renderCategoryDiagram', () => {
  it('returns the empty inbox placeholder for no categories', () => {
    const diagram = renderCategoryDiagram([]);

    expect(diagram).toBe(EMPTY_INBOX_DIAGRAM);
    expect(diagram).toContain('Inbox - No categories yet');
    expect(nodeLines(diagram)).toEqual([]);
  });

  it('renders the full diagram for a nested hierarchy', () => {
    expect(renderCategoryDiagram(sampleCategories)).toBe(
      [
        '```mermaid',
        'graph TD',
        '    inbox["📬 Inbox"]',
        '    node0["Work (45)"]',
        '    node1["Project Alpha (20)"]',
        '    node0 --> node1',
        '    node2["Project Beta (15)"]',
        '    node0 --> node2',
        '    inbox --> node0',
        '    node3["Hockey (30)"]',
        '    node4["Team A (18)"]',
        '    node3 --> node4',
        '    inbox --> node3',
        '',
        '    classDef inboxStyle fill:#4A90E2,stroke:#2E5C8A,color:#fff',
        '    class inbox inboxStyle',
        '```',
      ].join('\n'),
    );
  });

  it('connects Work from the inbox and Project Alpha from Work', () => {
    const diagram = renderCategoryDiagram([
      category('1', 'Work', null, 45),
      category('2', 'Project Alpha', '1', 20),
    ]);
    const lines = diagram.split('\n');

    expect(lines.indexOf('    node0["Work (45)"]')).toBeLessThan(lines.indexOf('    node1["Project Alpha (20)"]'));
    expect(edgeLines(diagram)).toEqual(['    node0 --> node1', '    inbox --> node0']);
  });

  it('emits one node and one edge per record', () => {
    const diagram = renderCategoryDiagram(sampleCategories);

    expect(nodeLines(diagram)).toHaveLength(sampleCategories.length);
    expect(edgeLines(diagram)).toHaveLength(sampleCategories.length);
  });

  it('omits the count annotation when the count is zero', () => {
    const diagram = renderCategoryDiagram([category('1', 'Receipts', null, 0)]);

    expect(nodeLines(diagram)).toEqual(['    node0["Receipts"]']);
  });

  it('places a record with a dangling parent under the inbox', () => {
    const diagram = renderCategoryDiagram([
      category('1', 'Work', null, 3),
      category('2', 'Orphan', 'missing', 7),
    ]);

    expect(nodeLines(diagram)).toEqual(['    node0["Work (3)"]', '    node1["Orphan (7)"]']);
    expect(edgeLines(diagram)).toEqual(['    inbox --> node0', '    inbox --> node1']);
  });

  it('does not add child counts to the parent', () => {
    const diagram = renderCategoryDiagram([
      category('1', 'Personal', null, 2),
      category('2', 'Family', '1', 10),
    ]);

    expect(diagram).toContain('    node0["Personal (2)"]');
  });

  it('resolves children that appear before their parent', () => {
    const diagram = renderCategoryDiagram([
      category('2', 'Team B', '1', 4),
      category('1', 'Hockey', null, 9),
    ]);

    expect(nodeLines(diagram)).toEqual(['    node0["Hockey (9)"]', '    node1["Team B (4)"]']);
    expect(edgeLines(diagram)).toEqual(['    node0 --> node1', '    inbox --> node0']);
  });

  it('keeps the tree structure when sibling order changes', () => {
    const reordered = [sampleCategories[4], sampleCategories[2], sampleCategories[0], sampleCategories[3], sampleCategories[1]];
    const tree = buildCategoryTree(reordered);

    expect(tree.roots).toEqual(['1', '4']);
    expect(tree.nodes.get('1')?.children).toEqual(['3', '2']);
    expect(tree.nodes.get('4')?.children).toEqual(['5']);
    expect(nodeLines(renderCategoryDiagram(reordered))).toEqual([
      '    node0["Work (45)"]',
      '    node1["Project Beta (15)"]',
      '    node2["Project Alpha (20)"]',
      '    node3["Hockey (30)"]',
      '    node4["Team A (18)"]',
    ]);
  });

  it('produces identical output on repeated calls', () => {
    expect(renderCategoryDiagram(sampleCategories)).toBe(renderCategoryDiagram(sampleCategories));
  });

  it('does not mutate its input', () => {
    const input = sampleCategories.map(record => ({ ...record }));
    renderCategoryDiagram(input);

    expect(input).toEqual(sampleCategories);
  });
});

describe('buildCategoryTree', () => {
  it('keeps the first position and the last fields for duplicate ids', () => {
    const tree = buildCategoryTree([
      category('1', 'Old', null, 1),
      category('2', 'Other', null, 2),
      category('1', 'New', null, 5),
    ]);

    expect(tree.roots).toEqual(['1', '2']);
    expect(tree.nodes.get('1')?.name).toBe('New');
    expect(tree.nodes.get('1')?.emailCount).toBe(5);
  });

  it('leaves records on a parent cycle out of the roots', () => {
    const tree = buildCategoryTree([
      category('1', 'A', '2', 0),
      category('2', 'B', '1', 0),
      category('3', 'C', null, 0),
    ]);

    expect(tree.roots).toEqual(['3']);
  });
});

describe('formatNodeLabel', () => {
  it('escapes double quotes for mermaid', () => {
    expect(formatNodeLabel('The "Big" Project', 2)).toBe('The #quot;Big#quot; Project (2)');
  });
});

describe('generateInboxDiagram', () => {
  it('defaults malformed fields before rendering', () => {
    const diagram = generateInboxDiagram([
      { id: 1, name: 'Work', parent_id: null, email_count: 4 },
      { id: 2, parent_id: 1 },
      { id: 3, name: 'Bills', parent_id: '', email_count: -2 },
    ]);

    expect(nodeLines(diagram)).toEqual(['    node0["Work (4)"]', '    node1[""]', '    node2["Bills"]']);
    expect(edgeLines(diagram)).toEqual(['    node0 --> node1', '    inbox --> node0', '    inbox --> node2']);
  });

  it('renders the placeholder for an empty list', () => {
    expect(generateInboxDiagram([])).toBe(EMPTY_INBOX_DIAGRAM);
  });

  it('rejects input that is not a list', () => {
    expect(() => generateInboxDiagram({ id: '1' })).toThrow();
  });
});
