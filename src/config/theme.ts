/** Colour tokens backed by CSS variables in `src/index.css`. */
export const THEME_COLORS = [
  "background",
  "foreground",
  "card",
  "border",
  "input",
  "accent",
  "muted-foreground",
  "secondary",
  "secondary-foreground",
  "success",
  "success-foreground",
  "destructive",
  "destructive-foreground",
] as const;

export type ThemeColor = (typeof THEME_COLORS)[number];

/** Tailwind colour value for a token; keeps opacity modifiers such as `/10` working. */
export function themeColor(name: ThemeColor): string {
  return `hsl(var(--${name}) / <alpha-value>)`;
}

export function themeColors(): Record<string, string> {
  return Object.fromEntries(THEME_COLORS.map((name) => [name, themeColor(name)]));
}
