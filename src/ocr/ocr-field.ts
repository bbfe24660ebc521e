import JSON5 from 'json5';
import { FieldNode, OcrWireField, ocrWireFieldSchema } from './ocr.types';

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);

const annotationsOf = (wire: OcrWireField) => ({
  valueType: wire.value_type ?? 'unknown',
  confidence: wire.confidence ?? undefined,
  source: wire.source ?? undefined,
  requiresManualReview: wire.requires_manual_review === true,
});

/**
 * Converts a wire field into the tagged tree. A populated `value_array` wins
 * over a populated `value_object`; anything else is a scalar carrying `value`.
 */
export function toFieldNode(wire: OcrWireField): FieldNode {
  const annotations = annotationsOf(wire);

  if (wire.value_array && wire.value_array.length > 0) {
    return { kind: 'array', items: wire.value_array.map(toFieldNode), ...annotations };
  }

  if (wire.value_object && Object.keys(wire.value_object).length > 0) {
    const fields: Record<string, FieldNode> = {};
    for (const [key, child] of Object.entries(wire.value_object)) {
      fields[key] = toFieldNode(child);
    }
    return { kind: 'object', fields, ...annotations };
  }

  return { kind: 'scalar', value: wire.value ?? null, ...annotations };
}

export function toFieldNodes(fields: Record<string, OcrWireField>): Record<string, FieldNode> {
  const nodes: Record<string, FieldNode> = {};
  for (const [key, wire] of Object.entries(fields)) {
    nodes[key] = toFieldNode(wire);
  }
  return nodes;
}

/** Interprets an untyped value (list element, map entry) as a node. */
function nodeFromUnknown(value: unknown): FieldNode {
  if (isPlainObject(value)) {
    const parsed = ocrWireFieldSchema.safeParse(value);
    if (parsed.success && isWireShaped(value)) {
      return toFieldNode(parsed.data);
    }
  }
  return { kind: 'scalar', value: value ?? null, valueType: 'unknown', requiresManualReview: false };
}

const WIRE_KEYS = ['value', 'value_type', 'value_object', 'value_array'];

// A plain map such as {"Description": "Milk"} also passes the lenient schema,
// so require at least one wire key before treating it as a field.
const isWireShaped = (value: Record<string, unknown>): boolean =>
  WIRE_KEYS.some(key => Object.prototype.hasOwnProperty.call(value, key));

/** Decodes a JSON (or JSON5) string value; other values pass through. */
function decodeEmbedded(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  const text = value.trim();
  if (!text.startsWith('[') && !text.startsWith('{')) {
    return value;
  }
  try {
    return JSON5.parse(text);
  } catch {
    return value;
  }
}

/**
 * Elements of a list-valued node. The service delivers lists either natively
 * (`value_array`) or as a generic scalar whose value is itself a list of wire
 * fields, sometimes still serialized as a string. Returns `undefined` when the
 * node is not a list in either form.
 */
export function elementsOf(node: FieldNode): FieldNode[] | undefined {
  switch (node.kind) {
    case 'array':
      return node.items;
    case 'object':
      return undefined;
    case 'scalar': {
      const decoded = decodeEmbedded(node.value);
      return Array.isArray(decoded) ? decoded.map(nodeFromUnknown) : undefined;
    }
  }
}

/**
 * Named children of a map-valued node: either a typed `value_object`, or a
 * scalar (`value_type` "dictionary") whose value is a key to wire-field map.
 */
export function entriesOf(node: FieldNode): Record<string, FieldNode> | undefined {
  switch (node.kind) {
    case 'object':
      return node.fields;
    case 'array':
      return undefined;
    case 'scalar': {
      const decoded = decodeEmbedded(node.value);
      if (!isPlainObject(decoded)) {
        return undefined;
      }
      const fields: Record<string, FieldNode> = {};
      for (const [key, child] of Object.entries(decoded)) {
        fields[key] = nodeFromUnknown(child);
      }
      return fields;
    }
  }
}

export function scalarValue(node: FieldNode | undefined): unknown {
  if (!node) {
    return undefined;
  }
  switch (node.kind) {
    case 'scalar':
      return node.value;
    case 'object':
    case 'array':
      return undefined;
  }
}
