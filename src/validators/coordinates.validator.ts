import { z } from 'zod';

const pageSchema = z.number().int().min(1).default(1);

const staticFieldSchema = z.object({
  page: pageSchema,
  x: z.number(),
  y: z.number(),
  align: z.enum(['left', 'center']).default('left'),
});

const itemsSectionSchema = z.object({
  page: pageSchema,
  start_y: z.number(),
  line_height: z.number().positive(),
  columns: z.object({
    name_x: z.number(),
    qty_x: z.number(),
    price_x: z.number(),
    total_x: z.number(),
  }),
});

const coordinateSpecSchema = z.object({
  static_fields: z.record(staticFieldSchema).default({}),
  items_section: itemsSectionSchema.optional(),
});

/** Shape of coordinates.json: template name -> layout */
export const coordinateCatalogSchema = z.record(coordinateSpecSchema);
