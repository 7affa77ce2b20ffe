// src/languages.ts
// Target languages offered in the form. Order is the dropdown order.
export const LANGUAGES = Object.freeze([
  { name: "Spanish", code: "es" },
  { name: "French", code: "fr" },
  { name: "German", code: "de" },
  { name: "Chinese (Simplified)", code: "zh-CN" },
  { name: "Japanese", code: "ja" },
  { name: "Korean", code: "ko" },
  { name: "Vietnamese", code: "vi" },
  { name: "Tagalog", code: "tl" },
  { name: "Russian", code: "ru" },
  { name: "Hindi", code: "hi" },
  { name: "Arabic", code: "ar" },
] as const);

export type Language = (typeof LANGUAGES)[number];
export type LanguageCode = Language["code"];

export function isLanguageCode(code: string): code is LanguageCode {
  return LANGUAGES.some((l) => l.code === code);
}

export function languageName(code: string): string {
  return LANGUAGES.find((l) => l.code === code)?.name ?? code;
}
