import { z } from 'zod';

export const MAX_FRAGMENTS = 2000 as const;
export const MAX_TEXT_CHARS = 20_000 as const;

const UnitIntervalSchema = z.number().min(0).max(1);

export const RawFragmentSchema = z.object({
  text: z.string().max(1000),
  confidence: UnitIntervalSchema,
  centerX: UnitIntervalSchema,
  centerY: UnitIntervalSchema,
});

const FragmentListSchema = z.array(RawFragmentSchema).max(MAX_FRAGMENTS);
const GramsSchema = z.number().int().positive();
const PriceTextSchema = z.string().trim().min(1).max(64);

export const AnalyzeLabelRequestSchema = z
  .object({
    fragments: FragmentListSchema.optional(),
    text: z.string().max(MAX_TEXT_CHARS).optional(),
  })
  .refine((body) => body.fragments !== undefined || body.text !== undefined, {
    message: 'Provide either fragments or text',
  });

export const ProductInfoRequestSchema = z.object({
  fragments: FragmentListSchema,
  priceText: PriceTextSchema.optional(),
  weightInGrams: GramsSchema.optional(),
});

export const ConvertPriceRequestSchema = z.object({
  price: PriceTextSchema,
  weightInGrams: GramsSchema.optional(),
});

export const PriceLookupRequestSchema = z
  .object({
    query: z.string().trim().max(200).optional(),
    fragments: FragmentListSchema.optional(),
    weightInGrams: GramsSchema.optional(),
  })
  .refine((body) => body.query !== undefined || body.fragments !== undefined, {
    message: 'Provide either query or fragments',
  });

export type AnalyzeLabelRequest = z.infer<typeof AnalyzeLabelRequestSchema>;
export type ProductInfoRequest = z.infer<typeof ProductInfoRequestSchema>;
export type ConvertPriceRequest = z.infer<typeof ConvertPriceRequestSchema>;
export type PriceLookupRequest = z.infer<typeof PriceLookupRequestSchema>;

export type RequestIssue = { path: string; message: string };

export const formatIssues = (error: z.ZodError): RequestIssue[] =>
  error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
