export type DocumentType =
  | 'nda'
  | 'act'
  | 'lease'
  | 'loan'
  | 'sale'
  | 'employment'
  | 'services'
  | 'other';

// first match wins
const DOCUMENT_TYPE_KEYWORDS: Array<[DocumentType, RegExp]> = [
  ['nda', /nda|конфиденциальн|неразглашени/i],
  ['act', /(^|[^а-яё])акт(а|ы|ов)?([^а-яё]|$)/i],
  ['lease', /аренд|на[йеё]м/i],
  ['loan', /займ|за[её]м|кредит/i],
  ['sale', /купл|продаж|поставк/i],
  ['employment', /трудов|работник|работодател/i],
  ['services', /услуг|подряд/i],
];

export function inferDocumentType(text: string): DocumentType {
  for (const [type, pattern] of DOCUMENT_TYPE_KEYWORDS) {
    if (pattern.test(text)) return type;
  }
  return 'other';
}
