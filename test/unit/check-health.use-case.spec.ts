import { CheckHealthUseCase } from '../../src/revenue/application/use-cases/check-health.use-case';
import { TransactionSource } from '../../src/revenue/application/interfaces/transaction-source.interface';

describe('CheckHealthUseCase', () => {
  let useCase: CheckHealthUseCase;
  let source: jest.Mocked<TransactionSource>;

  beforeEach(() => {
    source = {
      name: 'database',
      loadCandidates: jest.fn(),
      isHealthy: jest.fn(),
    } as jest.Mocked<TransactionSource>;

    useCase = new CheckHealthUseCase(source);
  });

  it('should report a healthy source', async () => {
    source.isHealthy.mockResolvedValue(true);

    const result = await useCase.execute();

    expect(result).toEqual({ source: 'database', healthy: true });
    expect(source.isHealthy).toHaveBeenCalledTimes(1);
  });

  it('should report an unhealthy source', async () => {
    source.isHealthy.mockResolvedValue(false);

    const result = await useCase.execute();

    expect(result).toEqual({ source: 'database', healthy: false });
  });

  it('should not load transactions for a health check', async () => {
    source.isHealthy.mockResolvedValue(true);

    await useCase.execute();

    expect(source.loadCandidates).not.toHaveBeenCalled();
  });
});
