import { describe, expect, it } from 'vitest';
import { getProcessedEnv, isStringLosslesslyNumeric } from './envLoader';

describe('envLoader', () => {
  it.each([
    ['60', true],
    ['2.5', true],
    ['-1', true],
    ['', false],
    ['abc', false],
    ['0x10', false],
    ['1e400', false],
  ])('isStringLosslesslyNumeric(%j) is %s', (value, expected) => {
    expect(isStringLosslesslyNumeric(value)).toBe(expected);
  });

  it('converts numeric strings and keeps the rest', () => {
    expect(getProcessedEnv({ TUYA_EXPORTER_PORT: '9100', TUYA_REGION: 'eu', EMPTY: '' })).toEqual({
      TUYA_EXPORTER_PORT: 9100,
      TUYA_REGION: 'eu',
      EMPTY: '',
    });
  });
});
