import { describe, it, expect, vi, afterEach } from 'vitest';
import { applyCountryRules } from '../../../src/validation-engine/validation-engine';
import {
  DEFAULT_RULE,
  getCountryRule,
  hasCountryRule,
  listCountryRules,
} from '../../../src/validation-engine/rule-registry';
import IRQ from '../../../src/validation-engine/countries/IRQ';
import PHL from '../../../src/validation-engine/countries/PHL';
import { createTestContext, createTestLogger, makeRecord } from '../../helpers';

describe('Rule registry', () => {
  it('looks rules up by code in any case', () => {
    expect(getCountryRule(' phl ')).toBe(PHL);
    expect(hasCountryRule('KEN')).toBe(true);
  });

  it('falls back to the default rule', () => {
    expect(getCountryRule('XYZ')).toBe(DEFAULT_RULE);
    expect(hasCountryRule('')).toBe(false);
  });

  it('lists every supported country by code', () => {
    const rules = listCountryRules();
    expect(rules).toHaveLength(20);
    expect(rules[0]).toEqual({ code: 'ESP', name: 'Spain' });
    expect(rules.map((rule) => rule.code)).toContain('LBN');
  });
});

describe('applyCountryRules', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('applies the rule for the country', () => {
    const record = makeRecord({ number: ['P12345678', 0.97] });
    const result = applyCountryRules(record, 'PHL', createTestContext());
    expect(result.fields.number).toBe('P1234567B');
    expect(record.fields.number).toBe('P12345678');
  });

  it('passes unknown countries through', () => {
    const record = makeRecord({ name: ['ANNA', 0.9] });
    expect(applyCountryRules(record, 'XYZ', createTestContext())).toEqual(record);
  });

  it('rolls back and logs a failing rule', () => {
    vi.spyOn(PHL, 'apply').mockImplementation(() => {
      throw new Error('boom');
    });
    const logger = createTestLogger();
    const record = makeRecord({ number: ['P12345678', 0.97] });

    const result = applyCountryRules(record, 'PHL', createTestContext({ logger }));

    expect(result).toBe(record);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ documentRef: 'doc-test', countryCode: 'PHL' }),
      'Country rule failed, keeping pre-rule values'
    );
  });

  it('hands the rule a frozen record', () => {
    vi.spyOn(IRQ, 'apply').mockImplementation((input) => {
      input.fields.name = 'CHANGED';
      return input;
    });
    const record = makeRecord({ name: ['ALI', 0.8] });

    const result = applyCountryRules(record, 'IRQ', createTestContext());

    expect(result).toBe(record);
    expect(record.fields.name).toBe('ALI');
  });
});
