import { deriveTableName } from '../../src/utils/derive-table-name';

describe('deriveTableName', () => {
  it('should drop an Entity suffix', () => {
    expect(deriveTableName('TransactionEntity')).toBe('transactions');
  });

  it('should drop a Machine suffix', () => {
    expect(deriveTableName('BankTransactionMachine')).toBe('bank_transactions');
  });

  it('should keep a suffix that is the whole name', () => {
    expect(deriveTableName('Machine')).toBe('machines');
  });

  it('should handle single-word class names', () => {
    expect(deriveTableName('Transfer')).toBe('transfers');
  });

  it('should handle multi-word PascalCase', () => {
    expect(deriveTableName('BankTransaction')).toBe('bank_transactions');
  });

  it('should handle class names ending in y', () => {
    expect(deriveTableName('LedgerEntry')).toBe('ledger_entries');
    expect(deriveTableName('PaymentDay')).toBe('payment_days');
  });

  it('should handle class names ending in s', () => {
    expect(deriveTableName('PaymentStatus')).toBe('payment_statuses');
  });

  it('should handle class names ending in x', () => {
    expect(deriveTableName('DepositBox')).toBe('deposit_boxes');
  });
});
