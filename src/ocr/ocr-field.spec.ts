import { elementsOf, entriesOf, scalarValue, toFieldNode } from './ocr-field';
import { FieldNode } from './ocr.types';

const item = (description: string) => ({
  value_type: 'dictionary',
  confidence: 0.9,
  value_object: { Description: { value: description, value_type: 'string' } },
});

describe('ocr field tree', () => {
  describe('toFieldNode', () => {
    it('prefers a populated value_array', () => {
      const node = toFieldNode({ value: 'ignored', value_type: 'array', value_array: [{ value: 1 }] });
      expect(node.kind).toBe('array');
    });

    it('builds object nodes from value_object', () => {
      const node = toFieldNode({ value_type: 'dictionary', value_object: { Name: { value: 'Tea' } } });
      expect(node).toEqual({
        kind: 'object',
        valueType: 'dictionary',
        confidence: undefined,
        source: undefined,
        requiresManualReview: false,
        fields: {
          Name: {
            kind: 'scalar',
            value: 'Tea',
            valueType: 'unknown',
            confidence: undefined,
            source: undefined,
            requiresManualReview: false,
          },
        },
      });
    });

    it('treats empty containers as scalars', () => {
      const node = toFieldNode({ value: 'x', value_type: 'string', value_array: [], value_object: {} });
      expect(node).toMatchObject({ kind: 'scalar', value: 'x' });
    });

    it('keeps source and review annotations', () => {
      const node = toFieldNode({ value: 'Cafe', source: 'location', requires_manual_review: true });
      expect(node).toMatchObject({ source: 'location', requiresManualReview: true });
    });
  });

  describe('elementsOf', () => {
    it('returns the items of an array node', () => {
      const node = toFieldNode({ value_array: [item('Tea'), item('Cake')] });
      expect(elementsOf(node)?.map(element => element.kind)).toEqual(['object', 'object']);
    });

    it('parses a list carried inside a scalar', () => {
      const node = toFieldNode({ value: [item('Tea'), item('Cake')], value_type: 'list' });
      const elements = elementsOf(node) ?? [];
      expect(elements.map(element => scalarValue(entriesOf(element)?.Description))).toEqual(['Tea', 'Cake']);
    });

    it('parses a list serialized as a string inside a scalar', () => {
      const node = toFieldNode({ value: JSON.stringify([item('Tea')]), value_type: 'string' });
      const elements = elementsOf(node) ?? [];
      expect(elements).toHaveLength(1);
      expect(scalarValue(entriesOf(elements[0])?.Description)).toBe('Tea');
    });

    it('returns undefined for non-list nodes', () => {
      expect(elementsOf(toFieldNode({ value: 'Tea' }))).toBeUndefined();
      expect(elementsOf(toFieldNode({ value: '[not json' }))).toBeUndefined();
      expect(elementsOf(toFieldNode({ value_object: { A: { value: 1 } } }))).toBeUndefined();
    });
  });

  describe('entriesOf', () => {
    it('reads a plain key to field map held in a scalar', () => {
      const node: FieldNode = {
        kind: 'scalar',
        value: { Description: { value: 'Milk', value_type: 'string' }, Quantity: { value: 2 } },
        valueType: 'dictionary',
        requiresManualReview: false,
      };
      const entries = entriesOf(node);
      expect(scalarValue(entries?.Description)).toBe('Milk');
      expect(scalarValue(entries?.Quantity)).toBe(2);
    });

    it('keeps raw values that are not wire fields', () => {
      const node: FieldNode = {
        kind: 'scalar',
        value: { Description: 'Milk', Price: 1.2 },
        valueType: 'dictionary',
        requiresManualReview: false,
      };
      const entries = entriesOf(node);
      expect(scalarValue(entries?.Description)).toBe('Milk');
      expect(scalarValue(entries?.Price)).toBe(1.2);
    });

    it('returns undefined for arrays', () => {
      expect(entriesOf(toFieldNode({ value_array: [item('Tea')] }))).toBeUndefined();
    });
  });
});
