import { Injectable, Inject } from '@nestjs/common';
import { TransactionSource } from '../interfaces/transaction-source.interface';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

export interface HealthStatus {
  source: string;
  healthy: boolean;
}

@Injectable()
export class CheckHealthUseCase {
  constructor(
    @Inject(INJECTION_TOKENS.TRANSACTION_SOURCE)
    private readonly source: TransactionSource,
  ) {}

  async execute(): Promise<HealthStatus> {
    const healthy = await this.source.isHealthy();
    return { source: this.source.name, healthy };
  }
}
