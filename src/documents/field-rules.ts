export type FieldKind =
  | 'inn'
  | 'ogrn'
  | 'kpp'
  | 'bik'
  | 'date'
  | 'passport'
  | 'account'
  | 'phone'
  | 'email'
  | 'area'
  | 'amount'
  | 'text';

export interface FieldRule {
  kind: FieldKind;
  /** matched against the placeholder name */
  pattern: RegExp;
  exclude?: RegExp;
  hint: string;
  error: string;
  validate: (value: string) => boolean;
  format: (value: string) => string;
}

export type FieldValidation =
  | { ok: true; value: string }
  | { ok: false; error: string };

export const MAX_TEXT_VALUE_LENGTH = 500;

const digitsOnly = (value: string) => value.replace(/[\s()-]/g, '');
const keep = (value: string) => value;

function isCalendarDate(value: string): boolean {
  const match = /^(\d{2})\.(\d{2})\.(\d{4})$/.exec(value);
  if (!match) return false;

  const [day, month, year] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

export function groupThousands(value: string): string {
  return value.replace(/\s/g, '').replace(/\B(?=(\d{3})+(?!\d))/g, ' ');
}

// first match wins; order matters (ДАТА_ВЫДАЧИ_ПАСПОРТА is a date)
export const FIELD_RULES: readonly FieldRule[] = [
  {
    kind: 'inn',
    pattern: /(^|_)(ИНН|INN)(_|$)/i,
    hint: '10 цифр для организации или 12 цифр для ИП и физического лица',
    error: '❗ ИНН должен состоять из 10 или 12 цифр.',
    validate: (v) => /^(\d{10}|\d{12})$/.test(v),
    format: keep,
  },
  {
    kind: 'ogrn',
    pattern: /ОГРН|OGRN/i,
    hint: '13 цифр (ОГРН) или 15 цифр (ОГРНИП)',
    error: '❗ ОГРН должен состоять из 13 или 15 цифр.',
    validate: (v) => /^(\d{13}|\d{15})$/.test(v),
    format: keep,
  },
  {
    kind: 'kpp',
    pattern: /(^|_)(КПП|KPP)(_|$)/i,
    hint: '9 цифр',
    error: '❗ КПП должен состоять из 9 цифр.',
    validate: (v) => /^\d{9}$/.test(v),
    format: keep,
  },
  {
    kind: 'bik',
    pattern: /(^|_)(БИК|BIK)(_|$)/i,
    hint: '9 цифр',
    error: '❗ БИК должен состоять из 9 цифр.',
    validate: (v) => /^\d{9}$/.test(v),
    format: keep,
  },
  {
    kind: 'date',
    pattern: /ДАТА|DATE|СРОК_ДО/i,
    hint: 'в формате ДД.ММ.ГГГГ, например 01.09.2025',
    error: '❗ Укажи дату в формате ДД.ММ.ГГГГ.',
    validate: isCalendarDate,
    format: keep,
  },
  {
    kind: 'passport',
    pattern: /ПАСПОРТ|PASSPORT/i,
    exclude: /ВЫДАН|КЕМ|ISSUED/i,
    hint: 'серия и номер: 4 цифры и 6 цифр',
    error: '❗ Укажи серию и номер паспорта: 4 цифры и 6 цифр.',
    validate: (v) => /^\d{4}\s?\d{6}$/.test(v),
    format: (v) => v.replace(/^(\d{4})\s?(\d{6})$/, '$1 $2'),
  },
  {
    kind: 'account',
    pattern: /СЧ[ЕЁ]Т|Р\/С|(^|_)РС(_|$)|ACCOUNT/i,
    hint: '20 цифр',
    error: '❗ Номер счёта должен состоять из 20 цифр.',
    validate: (v) => /^\d{20}$/.test(v.replace(/\s/g, '')),
    format: (v) => v.replace(/\s/g, ''),
  },
  {
    kind: 'phone',
    pattern: /ТЕЛЕФОН|PHONE|(^|_)ТЕЛ(_|$)/i,
    hint: 'например +7 900 123-45-67',
    error: '❗ Укажи телефон в формате +7XXXXXXXXXX.',
    validate: (v) => /^(\+7|8)\d{10}$/.test(digitsOnly(v)),
    format: (v) => `+7${digitsOnly(v).slice(-10)}`,
  },
  {
    kind: 'email',
    pattern: /E_?MAIL|ПОЧТ[АЫЕУ]/i,
    hint: 'например name@example.ru',
    error: '❗ Укажи корректный адрес электронной почты.',
    validate: (v) => /^[^\s@]+@[^\s@]+\.[^\s@]+$/.test(v),
    format: keep,
  },
  {
    kind: 'area',
    pattern: /ПЛОЩАД|AREA/i,
    hint: 'число в квадратных метрах, например 30 или 45,5',
    error: '❗ Укажи площадь положительным числом.',
    validate: (v) => /^\d+([.,]\d+)?$/.test(v) && Number(v.replace(',', '.')) > 0,
    format: (v) => v.replace('.', ','),
  },
  {
    kind: 'amount',
    pattern: /СУММ|СТОИМОСТ|ЦЕН[АЫУ]?(_|$)|ПЛАТ[АЫУ]?(_|$)|AMOUNT|PRICE/i,
    exclude: /СРОК|ПОРЯДОК|СПОСОБ|ВАЛЮТ|ПРОПИСЬЮ/i,
    hint: 'только цифры, в рублях',
    error: '❗ Укажи сумму цифрами, без букв и знаков.',
    validate: (v) => /^\d+$/.test(v.replace(/\s/g, '')),
    format: groupThousands,
  },
  {
    kind: 'text',
    pattern: /.*/,
    hint: '',
    error: `❗ Значение должно быть не длиннее ${MAX_TEXT_VALUE_LENGTH} символов.`,
    validate: (v) => v.length <= MAX_TEXT_VALUE_LENGTH,
    format: keep,
  },
];

export function findFieldRule(placeholder: string): FieldRule {
  const rule = FIELD_RULES.find(
    (r) => r.pattern.test(placeholder) && !r.exclude?.test(placeholder),
  );
  return rule ?? FIELD_RULES[FIELD_RULES.length - 1];
}

export function validateFieldValue(placeholder: string, raw: string): FieldValidation {
  const value = raw.trim();
  if (!value) {
    return { ok: false, error: '❗ Значение не может быть пустым.' };
  }
  if (/[[\]]/.test(value)) {
    return { ok: false, error: '❗ Значение не должно содержать квадратных скобок.' };
  }

  const rule = findFieldRule(placeholder);
  if (!rule.validate(value)) {
    return { ok: false, error: rule.error };
  }
  return { ok: true, value: rule.format(value) };
}
