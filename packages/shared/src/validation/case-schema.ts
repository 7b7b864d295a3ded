import { z } from "zod";

export const customerTypeSchema = z.enum(["organization", "individual"]);

export const customerReferenceSchema = z.object({
  type: customerTypeSchema,
  id: z
    .string({ required_error: "validation.customer.id.required" })
    .trim()
    .min(1, "validation.customer.id.required")
});

export const caseTitleSchema = z
  .string({ required_error: "validation.caseTitle.required" })
  .trim()
  .min(1, "validation.caseTitle.required")
  .max(200, "validation.caseTitle.max");

export const caseCreateInputSchema = z.object({
  title: caseTitleSchema,
  description: z.string().trim().max(2000, "validation.caseDescription.max").nullish()
});

export const caseListQuerySchema = z.object({
  customerId: z
    .string({ required_error: "validation.customer.id.required" })
    .trim()
    .min(1, "validation.customer.id.required")
});

export type CustomerReferenceInput = z.infer<typeof customerReferenceSchema>;
export type CaseCreateInput = z.infer<typeof caseCreateInputSchema>;
