import { describe, it, expect } from 'vitest';
import { bracketFor, bracketLabel, classifyPayin, parseBracketLabel } from '../payin.js';
import { PayinBracket } from '../../types.js';

describe('classifyPayin', () => {
  it('puts boundary values in the lower bracket', () => {
    expect(classifyPayin(20).bracket).toBe(PayinBracket.Below20);
    expect(classifyPayin(20.01).bracket).toBe(PayinBracket.From21To30);
    expect(classifyPayin(30).bracket).toBe(PayinBracket.From21To30);
    expect(classifyPayin(30.01).bracket).toBe(PayinBracket.From31To50);
    expect(classifyPayin(50).bracket).toBe(PayinBracket.From31To50);
    expect(classifyPayin(50.01).bracket).toBe(PayinBracket.Above50);
  });

  it('parses percentage strings', () => {
    expect(classifyPayin('35%')).toEqual({ value: 35, bracket: PayinBracket.From31To50 });
    expect(classifyPayin(' 27.5 % ')).toEqual({ value: 27.5, bracket: PayinBracket.From21To30 });
  });

  it('defaults N/A and empty input to zero', () => {
    expect(classifyPayin('N/A')).toEqual({ value: 0, bracket: PayinBracket.Below20 });
    expect(classifyPayin('n/a')).toEqual({ value: 0, bracket: PayinBracket.Below20 });
    expect(classifyPayin('')).toEqual({ value: 0, bracket: PayinBracket.Below20 });
    expect(classifyPayin('   ')).toEqual({ value: 0, bracket: PayinBracket.Below20 });
  });

  it('defaults unparseable input instead of throwing', () => {
    expect(classifyPayin('about thirty')).toEqual({ value: 0, bracket: PayinBracket.Below20 });
    expect(classifyPayin('12.5.3')).toEqual({ value: 0, bracket: PayinBracket.Below20 });
    expect(classifyPayin(undefined)).toEqual({ value: 0, bracket: PayinBracket.Below20 });
    expect(classifyPayin(null)).toEqual({ value: 0, bracket: PayinBracket.Below20 });
    expect(classifyPayin({ payin: 30 })).toEqual({ value: 0, bracket: PayinBracket.Below20 });
    expect(classifyPayin(Number.NaN)).toEqual({ value: 0, bracket: PayinBracket.Below20 });
  });

  it('drops the sign of negative payins', () => {
    expect(classifyPayin('-25%')).toEqual({ value: 25, bracket: PayinBracket.From21To30 });
    expect(classifyPayin(-60)).toEqual({ value: 60, bracket: PayinBracket.Above50 });
  });

  it('never returns a negative value', () => {
    for (const raw of [0, -0.5, '-0', '0%']) {
      expect(classifyPayin(raw).value).toBeGreaterThanOrEqual(0);
    }
  });
});

describe('bracketFor', () => {
  it('maps zero and large values to the outer brackets', () => {
    expect(bracketFor(0)).toBe(PayinBracket.Below20);
    expect(bracketFor(99)).toBe(PayinBracket.Above50);
  });
});

describe('bracket labels', () => {
  it('renders the fixed label per bracket', () => {
    expect(bracketLabel(PayinBracket.Below20)).toBe('Payin Below 20%');
    expect(bracketLabel(PayinBracket.From21To30)).toBe('Payin 21% to 30%');
    expect(bracketLabel(PayinBracket.From31To50)).toBe('Payin 31% to 50%');
    expect(bracketLabel(PayinBracket.Above50)).toBe('Payin Above 50%');
  });

  it('finds a label inside free text, ignoring case', () => {
    expect(parseBracketLabel('payin above 50% only')).toBe(PayinBracket.Above50);
    expect(parseBracketLabel('Payin 21% to 30%')).toBe(PayinBracket.From21To30);
  });

  it('returns undefined when no label is present', () => {
    expect(parseBracketLabel('All Fuel')).toBeUndefined();
    expect(parseBracketLabel('Payin Above 20%')).toBeUndefined();
  });
});
