import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { createTheme, DEFAULT_THEME } from '../src/Theme';

describe('Theme', () => {
  it('starts from the default theme', () => {
    expect(createTheme()).toEqual(DEFAULT_THEME);
  });

  it('applies overrides on top of the base', () => {
    const theme = createTheme({ lineColor: '#112233', thinLineWidth: 0.25 });

    expect(theme.lineColor).toBe('#112233');
    expect(theme.thinLineWidth).toBe(0.25);
    expect(theme.triangleColor).toBe(DEFAULT_THEME.triangleColor);
  });

  it('layers on a custom base', () => {
    const base = createTheme({ circleColor: 'teal' });

    expect(createTheme({ thickLineWidth: 3 }, base)).toEqual({ ...DEFAULT_THEME, circleColor: 'teal', thickLineWidth: 3 });
  });

  it('returns a frozen theme and leaves the base untouched', () => {
    const theme = createTheme({ lineColor: 'red' });

    expect(Object.isFrozen(theme)).toBe(true);
    expect(DEFAULT_THEME.lineColor).toBe('black');
  });

  it('rejects invalid values and unknown keys', () => {
    expect(() => createTheme({ thickLineWidth: 0 })).toThrow(ZodError);
    expect(() => createTheme({ lineColor: '  ' })).toThrow(ZodError);
    expect(() => createTheme({ line_color: 'red' })).toThrow(ZodError);
    expect(() => createTheme('red')).toThrow(ZodError);
  });
});
