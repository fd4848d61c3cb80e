export const Palette = {
  white: '#ffffff',
  red: '#ff0000',
  darkRed: '#bf0000',
  orange: '#ff7f00',
  green: '#00ff00',
  lightGreen: '#3fff3f',
  desaturatedGreen: '#3f7f3f',
  darkerGreen: '#007f00',
  lightBlue: '#3f9fff',
  lightYellow: '#ffff3f',
  violet: '#7f00ff',
  lightViolet: '#9f3fff',
} as const;

export type ColorName = keyof typeof Palette;

export function isColorName(value: string): value is ColorName {
  return Object.prototype.hasOwnProperty.call(Palette, value);
}
