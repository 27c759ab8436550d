/**
 * Countries whose passports name a single issuing authority, so the place and
 * country of issue are known without reading them.
 */
import { fixedIssuerRule } from '../helpers';
import type { CountryRule } from '../rule-types';

export const FIXED_ISSUER_RULES: readonly CountryRule[] = [
  fixedIssuerRule('UZB', 'Uzbekistan', { placeOfIssue: 'UZBEKISTAN', countryOfIssue: 'UZBEKISTAN' }),
  fixedIssuerRule('RUS', 'Russia', {
    placeOfBirth: 'RUSSIA',
    placeOfIssue: 'RUSSIA',
    countryOfIssue: 'RUSSIA',
  }),
  fixedIssuerRule('UKR', 'Ukraine', { placeOfIssue: 'UKRAINE', countryOfIssue: 'UKRAINE' }),
  fixedIssuerRule('KGZ', 'Kyrgyzstan', { placeOfIssue: 'KYRGYZSTAN', countryOfIssue: 'KYRGYZSTAN' }),
  fixedIssuerRule('SEN', 'Senegal', { placeOfIssue: 'SENEGAL', countryOfIssue: 'SENEGAL' }),
  fixedIssuerRule('ESP', 'Spain', { placeOfIssue: 'SPAIN', countryOfIssue: 'SPAIN' }),
  fixedIssuerRule('GBR', 'United Kingdom', { countryOfIssue: 'UNITED KINGDOM' }),
  fixedIssuerRule('ZWE', 'Zimbabwe', {
    placeOfIssue: 'REGISTRAR GENERAL HRE',
    countryOfIssue: 'ZIMBABWE',
  }),
  fixedIssuerRule('LBN', 'Lebanon', { placeOfIssue: 'GDGS', countryOfIssue: 'LEBANON' }),
];
