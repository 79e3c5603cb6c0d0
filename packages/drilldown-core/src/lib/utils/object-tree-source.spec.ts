import { ROW_ROLES } from '../types/tree-zone';
import { ObjectTreeSource } from './object-tree-source';

interface Item {
  id: string;
  name?: string;
  children?: Item[];
}

const roots: Item[] = [
  { id: 'a', name: 'A', children: [{ id: 'a1', name: 'A1' }, { id: 'a2' }] },
  { id: 'b', name: 'B' },
];

describe('ObjectTreeSource', () => {
  it('counts children at every depth', () => {
    const source = new ObjectTreeSource<Item, { text: string }>(roots, () => undefined);
    expect(source.childCount([])).toBe(2);
    expect(source.childCount([0])).toBe(2);
    expect(source.childCount([1])).toBe(0);
    expect(source.childCount([0, 1])).toBe(0);
    expect(source.childCount([5])).toBe(0);
  });

  it('resolves items and labels by path', () => {
    const source = new ObjectTreeSource<Item, { text: string }>(roots, () => undefined);
    expect(source.itemAt([0, 0])?.id).toBe('a1');
    expect(source.itemAt([])).toBeNull();
    expect(source.itemAt([0, 7])).toBeNull();
    expect(source.labelAt([0])).toBe('A');
    expect(source.labelAt([0, 1])).toBe('a2');
    expect(source.labelAt([])).toBe('');
  });

  it('paints rows through the painter', () => {
    const row = { text: '' };
    const source = new ObjectTreeSource<Item, { text: string }>(roots, (target, item, role) => {
      target.text = `${role}:${item?.name ?? 'root'}`;
    });

    source.paint(row, [1], ROW_ROLES.ROOT);
    expect(row.text).toBe('root:B');

    source.paint(row, [], ROW_ROLES.UPWARD);
    expect(row.text).toBe('upward:root');
  });
});
