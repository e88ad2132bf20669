import { z } from "zod";

const optionalText = z.string().nullish();

export const locationRefSchema = z.object({
  id: z.string(),
  name: z.string()
});

export const labelSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: optionalText
});

export const locationSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: optionalText,
  itemCount: z.number().nullish()
});

export const itemSummarySchema = z.object({
  id: z.string(),
  name: z.string(),
  description: optionalText,
  quantity: z.number().nullish(),
  assetId: optionalText,
  manufacturer: optionalText,
  modelNumber: optionalText,
  location: locationRefSchema.nullish(),
  labels: z.array(labelSchema).nullish()
});

const fieldValue = z.union([z.string(), z.number(), z.boolean()]).nullish();

// Current Homebox splits a custom field's value by type; older exports carry a single `value`.
export const customFieldSchema = z.object({
  name: z.string(),
  type: z.string().nullish(),
  value: fieldValue,
  textValue: fieldValue,
  numberValue: fieldValue,
  booleanValue: fieldValue
});

// Homebox sends purchasePrice as a number; older builds send it as a string.
export const itemDetailsSchema = itemSummarySchema.extend({
  serialNumber: optionalText,
  purchaseFrom: optionalText,
  purchasePrice: z.union([z.number(), z.string()]).nullish(),
  purchaseTime: optionalText,
  lifetimeWarranty: z.boolean().nullish(),
  warrantyDetails: optionalText,
  warrantyExpires: optionalText,
  notes: optionalText,
  fields: z.array(customFieldSchema).nullish()
});

export const itemPageSchema = z
  .object({
    page: z.number().optional(),
    pageSize: z.number().optional(),
    total: z.number(),
    items: z.array(itemSummarySchema).nullish(),
    data: z.array(itemSummarySchema).nullish()
  })
  .transform(p => ({ page: p.page, pageSize: p.pageSize, total: p.total, items: p.items ?? p.data ?? [] }));

export const locationListSchema = z
  .union([z.array(locationSchema), z.object({ data: z.array(locationSchema).nullish() })])
  .transform(v => (Array.isArray(v) ? v : v.data ?? []));

export const labelListSchema = z
  .union([z.array(labelSchema), z.object({ data: z.array(labelSchema).nullish() })])
  .transform(v => (Array.isArray(v) ? v : v.data ?? []));

export const loginResponseSchema = z.object({
  token: z.string(),
  expiresAt: z.string().optional()
});

export type LocationRef = z.infer<typeof locationRefSchema>;
export type Label = z.infer<typeof labelSchema>;
export type Location = z.infer<typeof locationSchema>;
export type ItemSummary = z.infer<typeof itemSummarySchema>;
export type CustomField = z.infer<typeof customFieldSchema>;
export type ItemDetails = z.infer<typeof itemDetailsSchema>;
export type ItemPage = z.infer<typeof itemPageSchema>;

export type ItemQuery = {
  query?: string;
  locationIds?: string[];
  labelIds?: string[];
  page: number;
  pageSize: number;
};

export type NewItem = {
  name: string;
  description?: string;
  locationId?: string;
  labelIds?: string[];
};
