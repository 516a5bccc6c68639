// ASCII without NUL.
const ASCII_PATTERN = /^[\x01-\x7f]*$/;

export const isAscii = (value: string): boolean => ASCII_PATTERN.test(value);

export const hasLengthBetween = (value: string, min: number, max: number): boolean =>
  value.length >= min && value.length <= max;
