// Counts and cuts by code point so a surrogate pair is never split.

export const codePointLength = (text: string): number => Array.from(text).length;

export const sliceCodePoints = (text: string, end: number): string =>
  Array.from(text).slice(0, end).join("");
