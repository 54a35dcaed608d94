import { z } from 'zod';
import { boxToRectangle } from '../utils/geometry';

// Multipart fields arrive as strings
const coordinate = z.coerce.number().int().min(0);
const extent = z.coerce.number().int().min(1);

const edgesSchema = z.object({
  left: coordinate,
  top: coordinate,
  right: coordinate,
  bottom: coordinate,
});

const boxSchema = z
  .object({
    left: coordinate,
    top: coordinate,
    width: extent,
    height: extent,
  })
  .transform(boxToRectangle);

export const rectangleSchema = z.union([edgesSchema, boxSchema]);

export const angleSchema = z.coerce.number().int().min(-180).max(180).default(0);

const booleanField = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform(value => value === true || value === 'true' || value === '1')
  .default(false);

const namingTokenSchema = z
  .string()
  .min(1)
  .max(64)
  .refine(token => !/[\\/]/.test(token), 'Naming token must not contain path separators');

export const referenceRequestSchema = z.object({
  angle: angleSchema,
});

export const previewRequestSchema = z.object({
  angle: angleSchema,
  rectangle: rectangleSchema,
  clamp: booleanField,
});

export const cropBatchRequestSchema = z.object({
  angle: angleSchema,
  rectangle: rectangleSchema,
  clamp: booleanField,
  reference: z.string().min(1).optional(),
  namingStyle: z.enum(['suffix', 'prefix']).optional(),
  namingToken: namingTokenSchema.optional(),
});
