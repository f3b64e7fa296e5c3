import { Injectable } from '@nestjs/common';
import { parse } from 'csv-parse/sync';
import { TransactionCsvParser } from '../../application/interfaces/transaction-csv-parser.interface';
import type { TransactionCandidate } from '../../domain/entities/transaction.entity';
import { InvalidCsvException } from '../../domain/exceptions/invalid-csv.exception';

const CUSTOMER_ID_COLUMN = 'customerid';
const SALE_AMOUNT_COLUMN = 'saleamount';

/** `CustomerID`, `customer_id` and `Customer Id` all become `customerid`. */
export function normalizeHeader(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]/g, '');
}

function toCells(row: unknown): string[] {
  if (!Array.isArray(row)) {
    return [];
  }
  return row.map((cell: unknown) => (typeof cell === 'string' ? cell : ''));
}

function parseRows(csvText: string): unknown[] {
  try {
    const rows: unknown = parse(csvText, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
    return Array.isArray(rows) ? rows : [];
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidCsvException(`CSV could not be parsed: ${message}`);
  }
}

/**
 * Turns CSV text with a header row into transaction candidates. Cells are
 * passed through untouched (trimmed strings), validation happens in the
 * aggregator so a bad row is skipped rather than failing the whole file.
 */
export function parseTransactionCsv(csvText: string): TransactionCandidate[] {
  const [header, ...body] = parseRows(csvText);
  if (header === undefined || body.length === 0) {
    return [];
  }

  const headers = toCells(header).map(normalizeHeader);
  const customerIdIndex = headers.indexOf(CUSTOMER_ID_COLUMN);
  const saleAmountIndex = headers.indexOf(SALE_AMOUNT_COLUMN);

  const missing = [
    customerIdIndex < 0 ? 'CustomerID' : null,
    saleAmountIndex < 0 ? 'SaleAmount' : null,
  ].filter((column): column is string => column !== null);
  if (missing.length > 0) {
    throw new InvalidCsvException(
      `CSV missing required column(s): ${missing.join(', ')}`,
    );
  }

  return body.map((row) => {
    const cells = toCells(row);
    return {
      customerId: cells[customerIdIndex],
      saleAmount: cells[saleAmountIndex],
    };
  });
}

@Injectable()
export class CsvParseTransactionParser implements TransactionCsvParser {
  parse(text: string): TransactionCandidate[] {
    return parseTransactionCsv(text);
  }
}
