import { describe, it, expect } from 'vitest';
import PHL from '../../../src/validation-engine/countries/PHL';
import ETH from '../../../src/validation-engine/countries/ETH';
import KEN from '../../../src/validation-engine/countries/KEN';
import NPL from '../../../src/validation-engine/countries/NPL';
import LKA from '../../../src/validation-engine/countries/LKA';
import IND from '../../../src/validation-engine/countries/IND';
import PAK from '../../../src/validation-engine/countries/PAK';
import UGA from '../../../src/validation-engine/countries/UGA';
import IRQ from '../../../src/validation-engine/countries/IRQ';
import MMR from '../../../src/validation-engine/countries/MMR';
import MAR from '../../../src/validation-engine/countries/MAR';
import { getCountryRule } from '../../../src/validation-engine/rule-registry';
import { createTestContext, makeRecord } from '../../helpers';

describe('Country rules', () => {
  const ctx = createTestContext();

  describe('PHL', () => {
    it('fixes the series letter and clears parents', () => {
      const result = PHL.apply(
        makeRecord({ number: ['P12345678', 0.97], motherName: ['MARIA', 0.8] }),
        ctx
      );
      expect(result.fields.number).toBe('P1234567B');
      expect(result.confidences.number).toBe(0.8);
      expect(result.fields.motherName).toBe('');
      expect(result.confidences.motherName).toBe(1);
      expect(result.fields.fatherName).toBe('');
    });
  });

  describe('ETH', () => {
    it('scores the number and fixes the issuer', () => {
      const result = ETH.apply(makeRecord({ number: ['XX1234567', 0.9] }), ctx);
      expect(result.confidences.number).toBe(0.2);
      expect(result.fields.placeOfIssue).toBe('ETHIOPIA');
      expect(result.fields.countryOfIssue).toBe('ETHIOPIA');
      expect(result.confidences.countryOfIssue).toBe(1);
    });
  });

  describe('KEN', () => {
    it('canonicalizes the issuing authority', () => {
      const result = KEN.apply(
        makeRecord({
          number: ['AK1234567', 0.95],
          placeOfIssue: ['Government of Kenya Nairobi', 0.6],
          middleName: ['WAFULA', 0.7],
        }),
        ctx
      );
      expect(result.fields.number).toBe('AK1234567');
      expect(result.confidences.number).toBe(0.95);
      expect(result.fields.placeOfIssue).toBe('GOVERNMENT OF KENYA');
      expect(result.confidences.placeOfIssue).toBe(1);
      expect(result.fields.countryOfIssue).toBe('KENYA');
      expect(result.fields.middleName).toBe('');
    });

    it('blanks a missing place of issue with no confidence', () => {
      const result = KEN.apply(makeRecord({ number: ['AK1234567', 0.95] }), ctx);
      expect(result.fields.placeOfIssue).toBe('');
      expect(result.confidences.placeOfIssue).toBe(0);
    });
  });

  describe('NPL', () => {
    it('recognizes the passport department and truncates the number', () => {
      const result = NPL.apply(
        makeRecord({
          number: ['PA1234S678', 0.9],
          placeOfIssue: ['MOFA DEPARTMENT OF PASSPORTS', 0.5],
        }),
        ctx
      );
      expect(result.fields.placeOfIssue).toBe('MOFA');
      expect(result.fields.countryOfIssue).toBe('NEPAL');
      expect(result.fields.number).toBe('PA1234567');
      expect(result.confidences.number).toBeCloseTo(0.72);
      expect(result.fields.middleName).toBe('');
    });
  });

  describe('LKA', () => {
    it('recognizes the Colombo authority', () => {
      const result = LKA.apply(
        makeRecord({ number: ['N1234567', 0.9], placeOfIssue: ['AUTHORITY COLOMBO', 0.5] }),
        ctx
      );
      expect(result.fields.placeOfIssue).toBe('COLOMBO');
      expect(result.fields.countryOfIssue).toBe('SRI LANKA');
      expect(result.confidences.number).toBe(0.9);
    });
  });

  describe('IND', () => {
    it('moves the family name out of the father name slot', () => {
      const result = IND.apply(
        makeRecord({
          number: ['Z12345678X', 0],
          surname: ['KUMAR', 0.9],
          fatherName: ['RAJ SHARMA', 0.7],
          motherName: ['SITA DEVI', 0.8],
        }),
        ctx
      );
      expect(result.fields.number).toBe('Z12345678');
      expect(result.confidences.number).toBe(0.7);
      expect(result.fields.motherName).toBe('SITA');
      expect(result.confidences.motherName).toBe(0.8);
      expect(result.fields.middleName).toBe('KUMAR');
      expect(result.confidences.middleName).toBe(0.9);
      expect(result.fields.surname).toBe('RAJ SHARMA');
      expect(result.confidences.surname).toBe(0.7);
    });
  });

  describe('PAK', () => {
    it('reorders a comma-separated father name before moving it', () => {
      const result = PAK.apply(
        makeRecord({ surname: ['ALI', 0.9], fatherName: ['KHAN, IMRAN', 0.6] }),
        ctx
      );
      expect(result.fields.fatherName).toBe('IMRAN KHAN');
      expect(result.fields.surname).toBe('IMRAN KHAN');
      expect(result.confidences.surname).toBe(0.6);
      expect(result.fields.middleName).toBe('ALI');
    });
  });

  describe('UGA', () => {
    it('clears names not printed on the passport', () => {
      const result = UGA.apply(makeRecord({ middleName: ['OKELLO', 0.5] }), ctx);
      expect(result.fields).toEqual({ middleName: '', motherName: '', fatherName: '' });
    });
  });

  describe('IRQ', () => {
    it('drops a surname that ran into the given name', () => {
      const result = IRQ.apply(makeRecord({ name: ['ALI HASSAN', 0.8], surname: ['HASSAN', 0.9] }), ctx);
      expect(result.fields.name).toBe('ALI');
      expect(result.confidences.name).toBe(0.8);
    });

    it('leaves the name alone without a surname', () => {
      const record = makeRecord({ name: ['ALI HASSAN', 0.8] });
      expect(IRQ.apply(record, ctx)).toBe(record);
    });
  });

  describe('MMR', () => {
    it('splits a multi-word surname', () => {
      const result = MMR.apply(
        makeRecord({ surname: ['AUNG SAN SUU', 0.7], name: ['', 0.2], middleName: ['KYI', 0.5] }),
        ctx
      );
      expect(result.fields.surname).toBe('SUU');
      expect(result.confidences.surname).toBe(0.7);
      expect(result.fields.name).toBe('AUNG SAN');
      expect(result.confidences.name).toBe(0.2);
      expect(result.fields.middleName).toBe('');
    });

    it('splits the name when there is no surname', () => {
      const result = MMR.apply(makeRecord({ name: ['MYA THIDA', 0.6] }), ctx);
      expect(result.fields.surname).toBe('THIDA');
      expect(result.fields.name).toBe('MYA');
      expect(result.confidences.name).toBe(0.6);
    });

    it('keeps a single-word surname', () => {
      const result = MMR.apply(makeRecord({ surname: ['AUNG', 0.7], name: ['MYA THIDA', 0.6] }), ctx);
      expect(result.fields.surname).toBe('AUNG');
      expect(result.fields.name).toBe('MYA THIDA');
    });
  });

  describe('MAR', () => {
    it('reads French place names', () => {
      const result = MAR.apply(
        makeRecord({
          placeOfBirth: ['CASABLANCA MAROC', 0.7],
          placeOfIssue: ['CONSULAT GENERAL DE PARIS', 0.6],
        }),
        ctx
      );
      expect(result.fields.placeOfBirth).toBe('CASABLANCA');
      expect(result.confidences.placeOfBirth).toBeCloseTo(0.84);
      expect(result.fields.placeOfIssue).toBe('PARIS');
      expect(result.confidences.placeOfIssue).toBe(0.6);
    });

    it('leaves an unknown place of birth at its confidence', () => {
      const result = MAR.apply(makeRecord({ placeOfBirth: ['FES MAROC', 0.7] }), ctx);
      expect(result.fields.placeOfBirth).toBe('FES');
      expect(result.confidences.placeOfBirth).toBe(0.7);
    });

    it('needs DE as a whole word', () => {
      const record = makeRecord({ placeOfIssue: ['DEPARTEMENT RABAT', 0.6] });
      expect(MAR.apply(record, ctx).fields.placeOfIssue).toBe('DEPARTEMENT RABAT');
    });
  });

  describe('fixed issuers', () => {
    it('sets the Russian place of birth and issuer', () => {
      const result = getCountryRule('RUS').apply(makeRecord({ placeOfBirth: ['MOSKVA', 0.4] }), ctx);
      expect(result.fields).toEqual({
        placeOfBirth: 'RUSSIA',
        placeOfIssue: 'RUSSIA',
        countryOfIssue: 'RUSSIA',
      });
      expect(result.confidences.placeOfBirth).toBe(1);
    });

    it('sets only the country of issue for GBR', () => {
      const result = getCountryRule('GBR').apply(makeRecord({ placeOfIssue: ['HMPO', 0.8] }), ctx);
      expect(result.fields).toEqual({ placeOfIssue: 'HMPO', countryOfIssue: 'UNITED KINGDOM' });
    });

    it('names the Zimbabwean registrar', () => {
      const result = getCountryRule('ZWE').apply(makeRecord({}), ctx);
      expect(result.fields.placeOfIssue).toBe('REGISTRAR GENERAL HRE');
      expect(result.fields.countryOfIssue).toBe('ZIMBABWE');
    });
  });
});
