import { inferDocumentType } from './document-type';

describe('inferDocumentType', () => {
  it.each([
    ['Нужен договор аренды офиса 30 м² в Москве на 1 год', 'lease'],
    ['Соглашение о неразглашении для подрядчика', 'nda'],
    ['Акт выполненных работ по договору', 'act'],
    ['Договор оказания услуг по уборке', 'services'],
    ['Договор займа между физлицами', 'loan'],
    ['Договор купли-продажи автомобиля', 'sale'],
    ['Трудовой договор с бухгалтером', 'employment'],
    ['Доверенность на получение посылки', 'other'],
  ])('should classify "%s" as %s', (text, expected) => {
    expect(inferDocumentType(text)).toBe(expected);
  });

  it('should not read "контракт" as an act', () => {
    expect(inferDocumentType('Контракт на разработку сайта')).toBe('other');
  });
});
