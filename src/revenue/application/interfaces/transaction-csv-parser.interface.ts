import { TransactionCandidate } from '../../domain/entities/transaction.entity';

/**
 * Turns uploaded CSV text into transaction candidates. Throws
 * InvalidCsvException when the text cannot be read as sales data.
 */
export abstract class TransactionCsvParser {
  abstract parse(text: string): TransactionCandidate[];
}
