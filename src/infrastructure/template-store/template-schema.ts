import { z } from 'zod';

const optionalNumber = z.number().finite().nullish();

export const keyframeEntrySchema = z
  .object({
    x: optionalNumber,
    y: optionalNumber,
    font_size: optionalNumber,
  })
  .strict();

const FRAME_KEY_PATTERN = /^\d+$/;

export const textTemplateSchema = z.object({
  id: z.string().min(1),
  font: z.string().min(1),
  color: z.string().min(1),
  align: z.enum(['left', 'center', 'right']),
  placeholder: z.string(),
  stroke_width: z.number().finite().min(0).optional(),
  stroke_color: z.string().min(1).optional(),
  background_color: z.string().min(1).nullish(),
  keyframes: z.record(
    z.string().regex(FRAME_KEY_PATTERN, 'Keyframe keys must be non-negative integers'),
    keyframeEntrySchema,
  ),
});

export const templateFileSchema = z.object({
  frame_count: z.number().int().positive(),
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional(),
  text_templates: z.array(textTemplateSchema),
});

export type KeyframeEntryJson = z.infer<typeof keyframeEntrySchema>;

export type TextTemplateJson = z.infer<typeof textTemplateSchema>;

export type TemplateFileJson = z.infer<typeof templateFileSchema>;
