import { z } from 'zod';

const baseProductRecord = z.object({
  product_id: z.string(),
  name: z.string(),
  price: z.number().nonnegative(),
  quantity_available: z.number().int(),
});

export const BaseProductRecord = baseProductRecord.extend({
  type: z.literal('base'),
});

export const PhysicalProductRecord = baseProductRecord.extend({
  type: z.literal('physical'),
  weight: z.number().nonnegative(),
});

export const DigitalProductRecord = baseProductRecord.extend({
  type: z.literal('digital'),
  download_link: z.string(),
});

export const ProductRecordSchema = z.discriminatedUnion('type', [
  BaseProductRecord,
  PhysicalProductRecord,
  DigitalProductRecord,
]);

export const CartRecordSchema = z.object({
  product_id: z.string().min(1),
  quantity: z.number().int(),
});

export type ParsedProductRecord = z.infer<typeof ProductRecordSchema>;
export type ParsedCartRecord = z.infer<typeof CartRecordSchema>;

const KNOWN_KINDS = new Set(['base', 'physical', 'digital']);

// missing or unknown tags fall back to 'base'
export function normalizeProductTag(raw: unknown): unknown {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return raw;
  const tag: unknown = 'type' in raw ? raw.type : undefined;
  const type = typeof tag === 'string' && KNOWN_KINDS.has(tag) ? tag : 'base';
  return { ...raw, type };
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
