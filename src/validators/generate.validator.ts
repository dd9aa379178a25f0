import { z } from 'zod';

/** Customer ids become storage key segments and retrieval path params */
const CUSTOMER_ID_PATTERN = /^[A-Za-z0-9._-]+$/;
const CUSTOMER_ID_MESSAGE = 'Customer id may only contain letters, digits, dot, underscore and hyphen';
const CUSTOMER_ID_FIELDS = new Set(['customer_nipt', 'nipt']);

const scalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const itemRowSchema = z.object({
  name: scalarSchema.optional(),
  qty: scalarSchema.optional(),
  price: scalarSchema.optional(),
  total: scalarSchema.optional(),
});

const MISSING_FIELDS = "Request must include 'template_names' (as a list) and 'context'.";

const contextSchema = z
  .record(z.union([scalarSchema, z.array(itemRowSchema)]), {
    required_error: MISSING_FIELDS,
    invalid_type_error: "'context' must be an object",
  })
  .superRefine((context, ctx) => {
    for (const [field, value] of Object.entries(context)) {
      const isList = Array.isArray(value);
      if (field === 'items' && !isList) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [field], message: "'items' must be a list" });
      } else if (field !== 'items' && isList) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [field], message: `'${field}' must be a scalar value` });
      } else if (CUSTOMER_ID_FIELDS.has(field) && value !== null && !isList) {
        const id = String(value).trim();
        if (id !== '' && !CUSTOMER_ID_PATTERN.test(id)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [field], message: CUSTOMER_ID_MESSAGE });
        }
      }
    }
  })
  .refine((context) => Object.keys(context).length > 0, { message: "'context' must not be empty" });

export const generateRequestSchema = z.object(
  {
    /** Templates to stamp, merged in this order */
    template_names: z
      .array(z.string().min(1), {
        required_error: MISSING_FIELDS,
        invalid_type_error: "'template_names' must be a list",
      })
      .min(1, "'template_names' must name at least one template"),
    /** Values to stamp; `items` feeds the items table */
    context: contextSchema,
  },
  { invalid_type_error: 'Request body must be a JSON object' },
);

export const customerIdSchema = z
  .string()
  .regex(CUSTOMER_ID_PATTERN, CUSTOMER_ID_MESSAGE);
