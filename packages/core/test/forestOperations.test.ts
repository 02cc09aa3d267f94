import { describe, expect, it } from 'vitest';
import {
  ancestorsOf,
  findCursorInForest,
  findInForest,
  fromFlatForest,
  fromRows,
  toFlatForest,
  toPlacements,
  toRows,
} from '../src/entities/forest-operations.js';
import type { Forest } from '../src/entities/Tree.js';
import { InvalidRowsError } from '../src/errors/cursor.js';
import { exampleForest, focusOn, show, t } from './fixtures.js';

describe('Forest Operations', () => {
  describe('Locator', () => {
    it('returns the first match in pre-order', () => {
      expect(findInForest((value) => value < 0, exampleForest)).toBe(-1);
      expect(findInForest((value) => value > 50, exampleForest)).toBe(100);
      expect(findInForest((value) => value > 100, exampleForest)).toBe(101);
    });

    it('visits a whole subtree before the next sibling', () => {
      expect(findInForest((value) => value === -20 || value === 1, exampleForest)).toBe(-20);
    });

    it('returns null when nothing matches', () => {
      expect(findInForest((value) => value === 999, exampleForest)).toBeNull();
      expect(findInForest(() => true, [])).toBeNull();
      expect(findCursorInForest(() => true, [])).toBeNull();
    });

    it('returns falsy payloads as matches', () => {
      type Payload = string | number | boolean;
      const forest: Forest<Payload> = [t<Payload>(false, t(0)), t<Payload>('')];

      expect(findInForest((value) => value === 0, forest)).toBe(0);
      expect(findInForest((value) => value === '', forest)).toBe('');
      expect(findInForest((value) => value === false, forest)).toBe(false);
      expect(findCursorInForest((value) => value === 0, forest)?.label()).toBe(0);
    });

    it('focuses the cursor on the matching node', () => {
      const cursor = findCursorInForest((value) => value === -110, exampleForest);

      expect(cursor?.label()).toBe(-110);
      expect(cursor?.depth).toBe(2);
      expect(cursor?.nextSibling()?.label()).toBe(-120);
    });

    it('agrees with findInForest on which node is found', () => {
      const predicates: Array<(value: number) => boolean> = [
        (value) => value % 2 === 0 && value > 0,
        (value) => value < -100,
        (value) => Math.abs(value) === 20,
        (value) => value === 120,
        () => false,
      ];

      for (const predicate of predicates) {
        const viaCursor = findCursorInForest(predicate, exampleForest)?.label() ?? null;
        expect(findInForest(predicate, exampleForest)).toBe(viaCursor);
      }
    });
  });

  describe('Ancestry', () => {
    it('lists the immediate parent first and the root last', () => {
      expect(ancestorsOf(focusOn(exampleForest, -120))).toEqual([-100, 100]);
      expect(ancestorsOf(focusOn(exampleForest, 101))).toEqual([100]);
    });

    it('is empty for a root', () => {
      expect(ancestorsOf(focusOn(exampleForest, 100))).toEqual([]);
    });

    it('has one entry per level of depth', () => {
      for (const value of [0, -1, -10, 101, 110]) {
        const cursor = focusOn(exampleForest, value);
        const ancestors = ancestorsOf(cursor);

        expect(ancestors).toHaveLength(cursor.depth);
        if (ancestors.length > 0) {
          expect(ancestors[ancestors.length - 1]).toBe(cursor.root().label());
        }
      }
    });
  });

  describe('Flatten / Unflatten', () => {
    it('round-trips a forest through a cursor', () => {
      const cursor = fromFlatForest(exampleForest);

      expect(cursor?.label()).toBe(0);
      expect(cursor ? toFlatForest(cursor) : null).toEqual(exampleForest);
    });

    it('keeps content when flattening from a nested focus', () => {
      expect(toFlatForest(focusOn(exampleForest, 20))).toEqual(exampleForest);
    });

    it('returns null for an empty forest', () => {
      expect(fromFlatForest([])).toBeNull();
    });

    it('refocusing the flattened first root gives an equal cursor', () => {
      const cursor = focusOn(exampleForest, 0);

      expect(fromFlatForest(toFlatForest(cursor))).toEqual(cursor);
    });
  });

  describe('Rows', () => {
    it('flattens to pre-order rows with depth', () => {
      const rows = toRows(exampleForest);

      expect(rows).toHaveLength(14);
      expect(rows.slice(0, 5)).toEqual([
        { depth: 0, value: 0 },
        { depth: 1, value: -1 },
        { depth: 2, value: -10 },
        { depth: 2, value: -20 },
        { depth: 1, value: 1 },
      ]);
      expect(rows[7]).toEqual({ depth: 0, value: 100 });
    });

    it('rebuilds the forest from its rows', () => {
      const result = fromRows(toRows(exampleForest));

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual(exampleForest);
      }
    });

    it('closes several levels at once when depth drops', () => {
      const result = fromRows([
        { depth: 0, value: 'a' },
        { depth: 1, value: 'b' },
        { depth: 2, value: 'c' },
        { depth: 0, value: 'd' },
        { depth: 1, value: 'e' },
      ]);

      expect(result.success && show(result.data)).toBe('a(b(c)) d(e)');
    });

    it('rebuilds an empty listing into an empty forest', () => {
      expect(fromRows([])).toEqual({ success: true, data: [] });
    });

    it('rejects a first row below the root level', () => {
      const result = fromRows([{ depth: 1, value: 'a' }]);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(InvalidRowsError);
        expect(result.error.rowIndex).toBe(0);
        expect(result.error.message).toBe('Row 0 must be at depth 0 (got 1)');
      }
    });

    it('rejects a row that skips a level', () => {
      const result = fromRows([
        { depth: 0, value: 'a' },
        { depth: 2, value: 'b' },
      ]);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.rowIndex).toBe(1);
        expect(result.error.message).toBe(
          'Row 1 at depth 2 is more than one level below the previous row'
        );
      }
    });

    it('rejects negative and fractional depths', () => {
      const negative = fromRows([
        { depth: 0, value: 'a' },
        { depth: -1, value: 'b' },
      ]);
      const fractional = fromRows([{ depth: 0.5, value: 'a' }]);

      expect(!negative.success && negative.error.message).toBe('Row 1 has invalid depth -1');
      expect(!fractional.success && fractional.error.message).toBe('Row 0 has invalid depth 0.5');
    });
  });

  describe('Placements', () => {
    it('records parent key and sibling position in pre-order', () => {
      const forest: Forest<string> = [t('a', t('b'), t('c')), t('d')];

      expect(toPlacements(forest, (value) => value.toUpperCase())).toEqual([
        { key: 'A', parentKey: null, position: 0 },
        { key: 'B', parentKey: 'A', position: 0 },
        { key: 'C', parentKey: 'A', position: 1 },
        { key: 'D', parentKey: null, position: 1 },
      ]);
    });
  });
});
