/**
 * Country rule registry: one entry per issuing country, keyed by ISO alpha-3.
 * Supporting a new country = adding a rule module and listing it here.
 */
import ETH from './countries/ETH';
import IND from './countries/IND';
import IRQ from './countries/IRQ';
import KEN from './countries/KEN';
import LKA from './countries/LKA';
import MAR from './countries/MAR';
import MMR from './countries/MMR';
import NPL from './countries/NPL';
import PAK from './countries/PAK';
import PHL from './countries/PHL';
import UGA from './countries/UGA';
import { FIXED_ISSUER_RULES } from './countries/fixed-issuers';
import type { CountryRule } from './rule-types';

const RULES: readonly CountryRule[] = [
  PHL,
  ETH,
  KEN,
  NPL,
  LKA,
  IND,
  PAK,
  UGA,
  IRQ,
  MMR,
  MAR,
  ...FIXED_ISSUER_RULES,
];

const RULES_BY_CODE = new Map(RULES.map((rule) => [rule.countryCode, rule]));

/** Countries without quirks pass through untouched. */
export const DEFAULT_RULE: CountryRule = {
  countryCode: '',
  countryName: '',
  apply: (record) => record,
};

export function getCountryRule(countryCode: string): CountryRule {
  return RULES_BY_CODE.get(countryCode.trim().toUpperCase()) ?? DEFAULT_RULE;
}

export function hasCountryRule(countryCode: string): boolean {
  return RULES_BY_CODE.has(countryCode.trim().toUpperCase());
}

export function listCountryRules(): { code: string; name: string }[] {
  return RULES.map((rule) => ({ code: rule.countryCode, name: rule.countryName })).sort((a, b) =>
    a.code.localeCompare(b.code)
  );
}
