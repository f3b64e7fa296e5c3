import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { AggregateCustomerRevenueUseCase } from './revenue/application/use-cases/aggregate-customer-revenue.use-case';
import type { RevenueQueryOptions } from './revenue/application/use-cases/aggregate-customer-revenue.use-case';
import { SortOrder } from './revenue/domain/enums/sort-order.enum';
import { formatRevenueCsv } from './revenue/infrastructure/csv/revenue-csv.formatter';

// One-shot report: aggregates the configured source and prints CSV on stdout.
// Usage: node dist/report.js [--sort=revenue_desc|customer_id|none] [--limit=N]

export function parseReportArgs(argv: string[]): RevenueQueryOptions {
  const options: RevenueQueryOptions = {};

  for (const arg of argv) {
    const [flag, value = ''] = arg.split('=', 2);
    if (flag === '--sort') {
      const sort = Object.values(SortOrder).find((order) => order === value);
      if (!sort) {
        throw new Error(`Unknown sort order: '${value}'`);
      }
      options.sort = sort;
    } else if (flag === '--limit') {
      const limit = Number(value);
      if (!Number.isInteger(limit) || limit < 1) {
        throw new Error(`Invalid limit: '${value}'`);
      }
      options.limit = limit;
    } else {
      throw new Error(`Unknown argument: '${arg}'`);
    }
  }

  return options;
}

async function run(): Promise<void> {
  const options = parseReportArgs(process.argv.slice(2));
  // stdout carries the report, so only errors are logged (to stderr)
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error'],
  });

  try {
    const report = await app
      .get(AggregateCustomerRevenueUseCase)
      .execute(options);
    process.stdout.write(formatRevenueCsv(report.customers));
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  run().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`report failed: ${message}\n`);
    process.exitCode = 1;
  });
}
