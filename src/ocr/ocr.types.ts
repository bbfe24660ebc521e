import { z } from 'zod';

/** A field exactly as the analysis service serializes it. */
export interface OcrWireField {
  value?: unknown;
  value_type?: string | null;
  confidence?: number | null;
  value_object?: Record<string, OcrWireField> | null;
  value_array?: OcrWireField[] | null;
  source?: string | null;
  requires_manual_review?: boolean | null;
}

export const ocrWireFieldSchema: z.ZodType<OcrWireField> = z.lazy(() =>
  z.object({
    value: z.unknown().optional(),
    value_type: z.string().nullish(),
    confidence: z.number().nullish(),
    value_object: z.record(ocrWireFieldSchema).nullish(),
    value_array: z.array(ocrWireFieldSchema).nullish(),
    source: z.string().nullish(),
    requires_manual_review: z.boolean().nullish(),
  }),
);

export const ocrValidationSchema = z.object({
  is_valid_receipt: z.boolean(),
  confidence: z.number(),
  message: z.string().nullish(),
  doc_type: z.string().nullish(),
});

export const ocrAnalyzeResponseSchema = z.object({
  success: z.boolean(),
  data: z
    .object({
      doc_type: z.string().nullish(),
      fields: z.record(ocrWireFieldSchema).nullish(),
      confidence: z.number().nullish(),
      metadata: z.record(z.unknown()).nullish(),
    })
    .nullish(),
  validation: ocrValidationSchema.nullish(),
  error: z.string().nullish(),
});

export interface ValidationVerdict {
  isValidReceipt: boolean;
  confidence: number;
  message: string;
  docType?: string;
}

/** Normalized result of one successful analysis call. */
export interface OcrAnalysis {
  docType: string;
  confidence: number;
  fields: Record<string, OcrWireField>;
  /** Location-specialized extractor output (postal code, country, strategy, ...). */
  metadata: Record<string, unknown>;
  validation?: ValidationVerdict;
  /** The `data` section as received, kept for the raw snapshot. */
  raw: unknown;
  /** Serialized response body, kept for failure records. */
  rawBody: string;
}

// Tagged field tree walked by the extractor.

interface FieldNodeBase {
  valueType: string;
  confidence?: number;
  source?: string;
  requiresManualReview: boolean;
}

export interface ScalarNode extends FieldNodeBase {
  kind: 'scalar';
  value: unknown;
}

export interface ObjectNode extends FieldNodeBase {
  kind: 'object';
  fields: Record<string, FieldNode>;
}

export interface ArrayNode extends FieldNodeBase {
  kind: 'array';
  items: FieldNode[];
}

export type FieldNode = ScalarNode | ObjectNode | ArrayNode;
