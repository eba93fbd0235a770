import { describe, expect, it } from 'vitest';

import { buildNewExpense } from '../add-utils.js';

describe('buildNewExpense', () => {
  it('should leave createdOn out when no date is given', () => {
    expect(buildNewExpense({ amount: '4.20', memo: 'Bus fare' })).toEqual({ amount: '4.20', memo: 'Bus fare' });
    expect(buildNewExpense({ amount: '4.20', memo: 'Bus fare', date: undefined })).not.toHaveProperty('createdOn');
  });

  it('should carry the date as createdOn', () => {
    expect(buildNewExpense({ amount: '4.20', memo: 'Bus fare', date: '2024-01-31' })).toEqual({
      amount: '4.20',
      memo: 'Bus fare',
      createdOn: '2024-01-31',
    });
  });
});
