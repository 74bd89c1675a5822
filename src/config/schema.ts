/**
 * Zod schemas for configuration.
 *
 * `UserConfigSchema` validates the defaults users write in
 * `~/.config/snipshot/config.json` or `.snipshot/config.json`.
 * `RenderConfigSchema` validates the final, merged settings of one run.
 */

import { z } from 'zod';

const HEX_COLOR = /^#(?:[0-9a-fA-F]{3,4}|[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/;

export const OutputFormatSchema = z.enum(['svg', 'html']);

const HexColorSchema = z.string().regex(HEX_COLOR, 'expected a hex color such as #ffffcc');
const FontSizeSchema = z.number().int().positive().max(512);

export const UserConfigSchema = z
  .object({
    format: OutputFormatSchema.optional(),
    style: z.string().min(1).optional(),
    fontFamily: z.string().min(1).optional(),
    fontSize: FontSizeSchema.optional(),
    transparent: z.boolean().optional(),
    highlightColor: HexColorSchema.optional(),
  })
  .strict();

export type ValidatedUserConfig = z.infer<typeof UserConfigSchema>;

export const RenderConfigSchema = z.object({
  format: OutputFormatSchema,
  language: z.string().min(1).optional(),
  style: z.string().min(1),
  fontFamily: z.string().min(1),
  fontSize: FontSizeSchema,
  transparent: z.boolean(),
  lines: z.array(z.number().int().positive()),
  highlightColor: HexColorSchema.optional(),
});
