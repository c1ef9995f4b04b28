import { describe, it, expect } from 'vitest';
import {
  classifyPersonalData,
  DETECTION_RULES,
  MESSAGES,
  passesLuhn,
  type DetectionRule,
} from '../server/services/personal-data';

describe('Personal Data Classification', () => {
  describe('unanalyzable input', () => {
    it.each([[''], ['   \n\t '], [null], [undefined]])('should return the no-text record for %j', (text) => {
      const record = classifyPersonalData(text, '.pdf');

      expect(record).toEqual({
        fileType: '.pdf',
        containsPersonalData: false,
        containsSpecialCategoryData: false,
        score: 0,
        textLength: 0,
        categoriesDetected: [],
        indicators: [],
        reviewReason: 'No se pudo extraer texto para analizar.',
        summary: 'Sin texto analizable.',
      });
    });
  });

  describe('nothing detected', () => {
    it('should report no categories for neutral text', () => {
      const record = classifyPersonalData('Acta de la reunión ordinaria del consejo.', '.txt');

      expect(record.containsPersonalData).toBe(false);
      expect(record.score).toBe(0);
      expect(record.textLength).toBe(41);
      expect(record.reviewReason).toBeNull();
      expect(record.summary).toBe(MESSAGES.nothingDetected);
    });
  });

  describe('card numbers', () => {
    const text = 'Contacto: ana.perez@example.com, tarjeta 4111 1111 1111 1111';

    it('should add Financiero for a Luhn-valid card and the cross-category bonus', () => {
      const record = classifyPersonalData(text, '.txt');

      expect(record.categoriesDetected).toEqual(['Contacto', 'Financiero']);
      expect(record.score).toBe(0.6);
      expect(record.indicators).toEqual(['ana.perez@example.com', '4111 1111 1111 1111']);
      expect(record.containsSpecialCategoryData).toBe(false);
      expect(record.reviewReason).toBeNull();
      expect(record.summary).toBe('Detectados datos personales. Categorías: Contacto, Financiero. Score: 0.60.');
      expect(record.textLength).toBe(text.length);
    });

    it('should count only the first Luhn-valid sequence', () => {
      const record = classifyPersonalData('Tarjetas: 4111 1111 1111 1111 y 5555 5555 5555 4444', '.txt');

      expect(record.categoriesDetected).toEqual(['Financiero']);
      expect(record.score).toBe(0.3);
      expect(record.indicators).toEqual(['4111 1111 1111 1111']);
    });

    it.each([
      { label: '13 digits', digits: '4222222222222' },
      { label: '19 digits', digits: `4${'0'.repeat(17)}6` },
    ])('should accept a Luhn-valid run of $label', ({ digits }) => {
      const record = classifyPersonalData(`Tarjeta ${digits}`, '.txt');

      expect(record.categoriesDetected).toEqual(['Financiero']);
      expect(record.score).toBe(0.3);
      expect(record.indicators).toEqual([digits]);
    });

    it.each([
      { label: '12 digits', digits: '422222222222' },
      { label: '20 digits', digits: `4${'0'.repeat(18)}2` },
    ])('should ignore a Luhn-valid run of $label', ({ digits }) => {
      expect(passesLuhn(digits)).toBe(true);

      const record = classifyPersonalData(`Tarjeta ${digits}`, '.txt');

      expect(record.categoriesDetected).toEqual([]);
      expect(record.score).toBe(0);
    });

    it('should not add the cross-category bonus for an IBAN and a card', () => {
      const record = classifyPersonalData('IBAN ES9121000418450200051332, tarjeta 4111 1111 1111 1111', '.txt');

      expect(record.categoriesDetected).toEqual(['Financiero']);
      expect(record.score).toBe(0.6);
      expect(record.indicators).toEqual(['ES9121000418450200051332', '4111 1111 1111 1111']);
      expect(record.summary).toBe('Detectados datos personales. Categorías: Financiero. Score: 0.60.');
    });

    it('should ignore a digit run that fails the Luhn check', () => {
      const record = classifyPersonalData(text.replace('1111 1111 1111 1111', '1111 1111 1111 1112'), '.txt');

      expect(record.categoriesDetected).toEqual(['Contacto']);
      expect(record.score).toBe(0.2);
      expect(record.summary).toBe('Detectados datos personales. Categorías: Contacto. Score: 0.20.');
    });
  });

  describe('special categories', () => {
    it('should flag health data and recommend legal review', () => {
      const record = classifyPersonalData('El trabajador presenta una baja médica tras un diagnóstico reciente.', '.docx');

      expect(record.categoriesDetected).toEqual(['Especial']);
      expect(record.containsSpecialCategoryData).toBe(true);
      expect(record.score).toBe(0.4);
      expect(record.indicators).toEqual(['baja médica', 'diagnóstico']);
      expect(record.reviewReason).toBe(MESSAGES.specialReview);
      expect(record.summary).toBe(
        'Detectados datos personales. Categorías: Especial. Score: 0.40. Revisión legal recomendada por posibles datos especialmente protegidos.'
      );
    });

    it('should not match a term inside a longer accented word', () => {
      const record = classifyPersonalData('El alcalde saludó a los vecinos.', '.txt');

      expect(record.categoriesDetected).toEqual([]);
      expect(record.containsSpecialCategoryData).toBe(false);
      expect(record.indicators).toEqual([]);
      expect(record.reviewReason).toBeNull();
    });

    it('should still match the term on its own', () => {
      const record = classifyPersonalData('Informe sobre su salud.', '.txt');

      expect(record.categoriesDetected).toEqual(['Especial']);
      expect(record.indicators).toEqual(['salud']);
    });

    it('should sum the weights of several special rules once each', () => {
      const record = classifyPersonalData('Constan antecedentes penales y afiliación sindical; antecedentes penales.', '.txt');

      expect(record.categoriesDetected).toEqual(['Especial']);
      expect(record.score).toBe(0.9);
      expect(record.indicators).toEqual(['afiliación sindical', 'antecedentes penales']);
    });
  });

  describe('scores and indicators', () => {
    it('should cap the score at 1', () => {
      const text = [
        'DNI 12345678Z',
        'correo: luis@example.org',
        'Domicilio: Calle Sol 3',
        'IBAN ES9121000418450200051332',
        'historia clínica',
        'huella dactilar',
        'religión',
        'condena penal',
      ].join('\n');
      const record = classifyPersonalData(text, '.txt');

      expect(record.score).toBe(1);
      expect(record.categoriesDetected).toEqual(['Contacto', 'Direcciones', 'Especial', 'Financiero', 'Identificativo']);
    });

    it('should de-duplicate indicators case-insensitively keeping the first form', () => {
      const record = classifyPersonalData('Escribir a Ana@Example.com o ana@example.com', '.txt');

      expect(record.indicators).toEqual(['Ana@Example.com']);
    });

    it('should keep at most three indicators per rule', () => {
      const record = classifyPersonalData('a@example.com b@example.com c@example.com d@example.com', '.txt');

      expect(record.indicators).toEqual(['a@example.com', 'b@example.com', 'c@example.com']);
    });

    it('should truncate long indicators to 90 characters', () => {
      const record = classifyPersonalData(`Domicilio ${'x'.repeat(200)}`, '.txt');

      expect(record.indicators).toHaveLength(1);
      expect(record.indicators[0]).toHaveLength(90);
    });

    it('should report containsPersonalData exactly when categories were found', () => {
      for (const text of ['nada relevante', 'tel 612 345 678']) {
        const record = classifyPersonalData(text, '.txt');
        expect(record.containsPersonalData).toBe(record.categoriesDetected.length > 0);
      }
    });

    it('should not take an identifier glued to a preceding letter', () => {
      const record = classifyPersonalData('Nº12345678Z', '.txt');

      expect(record.categoriesDetected).toEqual([]);
    });

    it('should keep at most 25 indicators', () => {
      const rules: DetectionRule[] = Array.from({ length: 10 }, (_, i): DetectionRule => ({
        category: 'Contacto',
        pattern: new RegExp(`r${i}-\\d`, 'g'),
        weight: 0.1,
        isSpecialCategory: false,
      }));
      const tokens = Array.from({ length: 10 }, (_, i) => [1, 2, 3].map((j) => `r${i}-${j}`)).flat();

      const record = classifyPersonalData(tokens.join(' '), '.txt', rules);

      expect(record.indicators).toEqual(tokens.slice(0, 25));
    });

    it('should accept a rule whose pattern is not global', () => {
      const rules: DetectionRule[] = [{ category: 'Contacto', pattern: /@/, weight: 0.2, isSpecialCategory: false }];

      const record = classifyPersonalData('a@b y c@d', '.txt', rules);

      expect(record.categoriesDetected).toEqual(['Contacto']);
      expect(record.score).toBe(0.2);
      expect(record.indicators).toEqual(['@']);
    });

    it('should use the rule table passed in', () => {
      const record = classifyPersonalData('Calle Mayor 1, tel 612 345 678', '.txt', DETECTION_RULES.slice(2, 3));

      expect(record.categoriesDetected).toEqual(['Contacto']);
      expect(record.indicators).toEqual(['612 345 678']);
    });
  });
});

describe('Luhn Check', () => {
  it('should accept valid numbers', () => {
    expect(passesLuhn('4111111111111111')).toBe(true);
    expect(passesLuhn('5555555555554444')).toBe(true);
  });

  it('should reject invalid or non-digit input', () => {
    expect(passesLuhn('4111111111111112')).toBe(false);
    expect(passesLuhn('4111-1111')).toBe(false);
    expect(passesLuhn('')).toBe(false);
  });
});
