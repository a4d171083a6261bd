import { describe, it, expect } from 'vitest';
import { createTransaction, isTransactionType } from '../transaction.js';
import { formatCalendarDate, parseCalendarDate } from '../calendarDate.js';
import {
  InvalidAmountError,
  InvalidDateError,
  InvalidTypeError,
  ValidationError,
} from '../errors.js';

describe('parseCalendarDate', () => {
  it('should accept real calendar dates', () => {
    expect(parseCalendarDate('2024-01-05')).toBe('2024-01-05');
    expect(parseCalendarDate('2024-02-29')).toBe('2024-02-29');
  });

  it('should reject impossible dates', () => {
    expect(() => parseCalendarDate('2023-02-29')).toThrow(InvalidDateError);
    expect(() => parseCalendarDate('2024-02-30')).toThrow(InvalidDateError);
    expect(() => parseCalendarDate('2024-13-01')).toThrow(InvalidDateError);
    expect(() => parseCalendarDate('2024-00-10')).toThrow(InvalidDateError);
  });

  it('should reject other formats', () => {
    expect(() => parseCalendarDate('05/01/2024')).toThrow(InvalidDateError);
    expect(() => parseCalendarDate('2024-1-5')).toThrow(InvalidDateError);
    expect(() => parseCalendarDate('2024-01-05T10:00:00Z')).toThrow(InvalidDateError);
    expect(() => parseCalendarDate('')).toThrow(InvalidDateError);
  });
});

describe('formatCalendarDate', () => {
  it('should use the local calendar day', () => {
    expect(formatCalendarDate(new Date(2024, 0, 5, 23, 59))).toBe('2024-01-05');
    expect(formatCalendarDate(new Date(2024, 11, 31, 0, 0))).toBe('2024-12-31');
  });
});

describe('createTransaction', () => {
  const valid = {
    date: '2024-01-10',
    type: 'Expense',
    category: 'Groceries',
    description: 'Weekly',
    amount: '50.25',
  };

  it('should build a transaction owned by the user', () => {
    expect(createTransaction(valid, 7)).toEqual({
      date: '2024-01-10',
      type: 'Expense',
      category: 'Groceries',
      description: 'Weekly',
      amountCents: 5025,
      userId: 7,
    });
  });

  it('should default a missing description to empty', () => {
    const tx = createTransaction({ ...valid, description: undefined }, 1);
    expect(tx.description).toBe('');
  });

  it('should keep category and description exactly as entered', () => {
    const tx = createTransaction({ ...valid, category: ' Salary ', description: '  note  ' }, 1);
    expect(tx.category).toBe(' Salary ');
    expect(tx.description).toBe('  note  ');
  });

  it('should accept an empty category', () => {
    const tx = createTransaction({ ...valid, category: '' }, 1);
    expect(tx.category).toBe('');
  });

  it('should reject non-positive amounts', () => {
    expect(() => createTransaction({ ...valid, amount: '0' }, 1)).toThrow(InvalidAmountError);
    expect(() => createTransaction({ ...valid, amount: '-10' }, 1)).toThrow(InvalidAmountError);
  });

  it('should only accept Income and Expense', () => {
    expect(() => createTransaction({ ...valid, type: 'Transfer' }, 1)).toThrow(InvalidTypeError);
    expect(() => createTransaction({ ...valid, type: 'income' }, 1)).toThrow(InvalidTypeError);
    expect(() => createTransaction({ ...valid, type: '' }, 1)).toThrow(InvalidTypeError);
  });

  it('should reject a bad date', () => {
    expect(() => createTransaction({ ...valid, date: '2024-02-30' }, 1)).toThrow(InvalidDateError);
  });

  it('should report the amount first when several fields are wrong', () => {
    expect(() =>
      createTransaction({ ...valid, amount: '0', type: 'Gift', date: 'soon' }, 1)
    ).toThrow(InvalidAmountError);
  });

  it('should raise ValidationError subclasses', () => {
    expect(() => createTransaction({ ...valid, type: 'Gift' }, 1)).toThrow(ValidationError);
  });
});

describe('isTransactionType', () => {
  it('should narrow the two known types', () => {
    expect(isTransactionType('Income')).toBe(true);
    expect(isTransactionType('Expense')).toBe(true);
    expect(isTransactionType('Refund')).toBe(false);
  });
});
