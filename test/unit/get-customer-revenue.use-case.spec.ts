import { GetCustomerRevenueUseCase } from '../../src/revenue/application/use-cases/get-customer-revenue.use-case';
import { RevenueAggregatorService } from '../../src/revenue/domain/services/revenue-aggregator.service';
import { TransactionSource } from '../../src/revenue/application/interfaces/transaction-source.interface';
import { CustomerRevenueNotFoundException } from '../../src/revenue/domain/exceptions/customer-revenue-not-found.exception';

describe('GetCustomerRevenueUseCase', () => {
  let useCase: GetCustomerRevenueUseCase;
  let source: jest.Mocked<TransactionSource>;

  beforeEach(() => {
    source = {
      name: 'database',
      loadCandidates: jest.fn(),
      isHealthy: jest.fn(),
    } as jest.Mocked<TransactionSource>;

    source.loadCandidates.mockResolvedValue([
      { customerId: 1001, saleAmount: 120.5 },
      { customerId: '1002', saleAmount: 75.25 },
      { customerId: '1001', saleAmount: '39.50' },
      { customerId: '1003', saleAmount: 210 },
      { customerId: '1004', saleAmount: 'n/a' },
    ]);

    useCase = new GetCustomerRevenueUseCase(
      source,
      new RevenueAggregatorService(),
    );
  });

  it('should return the total and revenue rank of the customer', async () => {
    const result = await useCase.execute('1001');

    expect(result).toEqual({
      customerId: '1001',
      totalRevenue: 160,
      transactionCount: 2,
      rank: 2,
    });
  });

  it('should normalize the requested id', async () => {
    const result = await useCase.execute(' 1003 ');

    expect(result.customerId).toBe('1003');
    expect(result.rank).toBe(1);
  });

  it('should throw CustomerRevenueNotFoundException for unknown customers', async () => {
    await expect(useCase.execute('9999')).rejects.toThrow(
      CustomerRevenueNotFoundException,
    );
  });

  it('should treat customers with only invalid rows as not found', async () => {
    await expect(useCase.execute('1004')).rejects.toThrow(
      "No revenue recorded for customer '1004'",
    );
  });
});
