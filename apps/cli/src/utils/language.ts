// ISO 639-2 (bibliographic and terminology) to ISO 639-1
const THREE_TO_TWO: Record<string, string> = {
  eng: 'en',
  spa: 'es',
  fra: 'fr',
  fre: 'fr',
  deu: 'de',
  ger: 'de',
  ita: 'it',
  por: 'pt',
  rus: 'ru',
  jpn: 'ja',
  kor: 'ko',
  zho: 'zh',
  chi: 'zh',
  ara: 'ar',
  nld: 'nl',
  dut: 'nl',
  pol: 'pl',
  swe: 'sv',
  tur: 'tr',
};

export function normalizeLanguageCode(code: string | undefined | null): string | undefined {
  const trimmed = (code || '').trim().toLowerCase();
  if (!trimmed) return undefined;
  if (trimmed.length === 3) {
    return THREE_TO_TWO[trimmed] ?? trimmed.slice(0, 2);
  }
  return trimmed;
}
