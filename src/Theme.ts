import { z } from 'zod';

/**
 * Style options consumed by the primitive builders.
 * @public
 */
export interface DrawTheme {
  readonly lineColor: string;
  readonly triangleColor: string;
  readonly circleColor: string;
  readonly perpendicularColor: string;
  readonly thickLineWidth: number;
  readonly thinLineWidth: number;
}

const colorSchema = z.string().trim().min(1, 'color must be a non-empty string');
const widthSchema = z.number().finite().positive('line width must be positive');

export const themeSchema = z
  .object({
    lineColor: colorSchema,
    triangleColor: colorSchema,
    circleColor: colorSchema,
    perpendicularColor: colorSchema,
    thickLineWidth: widthSchema,
    thinLineWidth: widthSchema,
  })
  .strict();

export const themeOverridesSchema = themeSchema.partial();

export type ThemeOverrides = z.infer<typeof themeOverridesSchema>;

/** @public */
export const DEFAULT_THEME: DrawTheme = Object.freeze({
  lineColor: 'black',
  triangleColor: 'black',
  circleColor: 'black',
  perpendicularColor: 'darkgrey',
  thickLineWidth: 1.5,
  thinLineWidth: 0.8,
});

/**
 * Builds a frozen theme from `base` with validated overrides applied.
 *
 * @throws ZodError when an override has the wrong type or an unknown key
 */
export function createTheme(overrides: unknown = {}, base: DrawTheme = DEFAULT_THEME): DrawTheme {
  const parsed = themeOverridesSchema.parse(overrides);
  const defined = Object.fromEntries(
    Object.entries(parsed).filter(([, value]) => value !== undefined)
  );
  return Object.freeze(themeSchema.parse({ ...base, ...defined }));
}
