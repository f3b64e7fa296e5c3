import {
  normalizeHeader,
  parseTransactionCsv,
} from '../../src/revenue/infrastructure/csv/transaction-csv.parser';
import { InvalidCsvException } from '../../src/revenue/domain/exceptions/invalid-csv.exception';

describe('Transaction CSV parsing', () => {
  it('should parse CustomerID and SaleAmount columns from a prepared file', () => {
    const csv = [
      'TransactionID,SaleDate,CustomerID,SaleAmount,PaymentType',
      '550,2024-01-06,1001,120.50,Credit',
      '551,2024-01-06,1002,75.25,Debit',
    ].join('\n');

    expect(parseTransactionCsv(csv)).toEqual([
      { customerId: '1001', saleAmount: '120.50' },
      { customerId: '1002', saleAmount: '75.25' },
    ]);
  });

  it('should match header spellings after normalization', () => {
    expect(normalizeHeader('CustomerID')).toBe('customerid');
    expect(normalizeHeader('customer_id')).toBe('customerid');
    expect(normalizeHeader('Sale Amount')).toBe('saleamount');

    const csv = ['customer_id,sale_amount', 'C1,10'].join('\n');
    expect(parseTransactionCsv(csv)).toEqual([
      { customerId: 'C1', saleAmount: '10' },
    ]);
  });

  it('should trim cells and strip a byte order mark', () => {
    const csv = ['\uFEFFCustomerID,SaleAmount', ' C1 , 5 '].join('\n');

    expect(parseTransactionCsv(csv)).toEqual([
      { customerId: 'C1', saleAmount: '5' },
    ]);
  });

  it('should keep short and blank rows as candidates for the aggregator to skip', () => {
    const csv = ['CustomerID,SaleAmount', 'C1', ',5', 'C2,4'].join('\n');

    expect(parseTransactionCsv(csv)).toEqual([
      { customerId: 'C1', saleAmount: undefined },
      { customerId: '', saleAmount: '5' },
      { customerId: 'C2', saleAmount: '4' },
    ]);
  });

  it('should return no rows for empty or header-only input', () => {
    expect(parseTransactionCsv('')).toEqual([]);
    expect(parseTransactionCsv('CustomerID,SaleAmount\n')).toEqual([]);
  });

  it('should reject CSV without a required column', () => {
    const csv = ['CustomerID,Amount', 'C1,5'].join('\n');

    expect(() => parseTransactionCsv(csv)).toThrow(InvalidCsvException);
    expect(() => parseTransactionCsv(csv)).toThrow(
      'CSV missing required column(s): SaleAmount',
    );
  });

  it('should reject text that is not valid CSV', () => {
    const csv = ['CustomerID,SaleAmount', '"C1,5'].join('\n');

    expect(() => parseTransactionCsv(csv)).toThrow(InvalidCsvException);
  });
});
