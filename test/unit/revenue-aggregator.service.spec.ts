import { RevenueAggregatorService } from '../../src/revenue/domain/services/revenue-aggregator.service';
import { TransactionCandidate } from '../../src/revenue/domain/entities/transaction.entity';
import { RejectionReason } from '../../src/revenue/domain/enums/rejection-reason.enum';
import { SortOrder } from '../../src/revenue/domain/enums/sort-order.enum';

describe('RevenueAggregatorService', () => {
  let service: RevenueAggregatorService;

  beforeEach(() => {
    service = new RevenueAggregatorService();
  });

  const tx = (customerId: unknown, saleAmount: unknown): TransactionCandidate => ({
    customerId,
    saleAmount,
  });

  describe('aggregate()', () => {
    it('should return an empty result for empty input', () => {
      const result = service.aggregate([]);

      expect(result.totals).toEqual([]);
      expect(service.toRevenueMap(result)).toEqual({});
      expect(result.transactionsRead).toBe(0);
      expect(result.transactionsAggregated).toBe(0);
      expect(result.grandTotal).toBe(0);
      expect(result.skipped).toEqual([]);
    });

    it('should total a single transaction', () => {
      const result = service.aggregate([tx('C1', 50)]);

      expect(service.toRevenueMap(result)).toEqual({ C1: 50 });
    });

    it('should sum transactions per customer in first-seen order', () => {
      const result = service.aggregate([
        tx('C1', 30),
        tx('C2', 20),
        tx('C1', 15),
      ]);

      expect(service.toRevenueMap(result)).toEqual({ C1: 45, C2: 20 });
      expect(result.totals).toEqual([
        { customerId: 'C1', totalRevenue: 45, transactionCount: 2 },
        { customerId: 'C2', totalRevenue: 20, transactionCount: 1 },
      ]);
      expect(result.grandTotal).toBe(65);
    });

    it('should skip non-numeric amounts without halting', () => {
      const result = service.aggregate([tx('C1', 30), tx('C1', 'bad')]);

      expect(service.toRevenueMap(result)).toEqual({ C1: 30 });
      expect(result.skipped).toEqual([
        { index: 1, reason: RejectionReason.INVALID_SALE_AMOUNT },
      ]);
      expect(result.transactionsRead).toBe(2);
      expect(result.transactionsAggregated).toBe(1);
    });

    it('should skip negative amounts', () => {
      const result = service.aggregate([tx('C1', -5), tx('C1', 10)]);

      expect(service.toRevenueMap(result)).toEqual({ C1: 10 });
      expect(result.skipped).toEqual([
        { index: 0, reason: RejectionReason.NEGATIVE_SALE_AMOUNT },
      ]);
    });

    it('should exclude rows without a customer id entirely', () => {
      const result = service.aggregate([
        tx('C1', 10),
        { saleAmount: 99 },
        tx('C2', 5),
        tx('', 1),
      ]);

      expect(service.toRevenueMap(result)).toEqual({ C1: 10, C2: 5 });
      expect(result.skipped).toEqual([
        { index: 1, reason: RejectionReason.MISSING_CUSTOMER_ID },
        { index: 3, reason: RejectionReason.MISSING_CUSTOMER_ID },
      ]);
    });

    it('should report the customer id first when both fields are bad', () => {
      const result = service.aggregate([tx(1.5, 'bad')]);

      expect(result.skipped).toEqual([
        { index: 0, reason: RejectionReason.INVALID_CUSTOMER_ID },
      ]);
    });

    it('should give the same totals regardless of interleaving', () => {
      const rows = [
        tx('C1', 12.5),
        tx('C2', 3),
        tx('C1', 7.25),
        tx('C3', 100),
        tx('C2', 4),
      ];
      const reordered = [rows[3], rows[1], rows[4], rows[2], rows[0]];

      expect(service.toRevenueMap(service.aggregate(reordered))).toEqual(
        service.toRevenueMap(service.aggregate(rows)),
      );
      expect(service.toRevenueMap(service.aggregate(rows))).toEqual({
        C1: 19.75,
        C2: 7,
        C3: 100,
      });
    });

    it('should be idempotent over the same input', () => {
      const rows = [tx('C1', 30), tx('C2', 'x'), tx('C1', 15)];

      expect(service.aggregate(rows)).toEqual(service.aggregate(rows));
    });

    it('should count repeated rows independently', () => {
      const result = service.aggregate([tx('C1', 10), tx('C1', 10)]);

      expect(result.totals).toEqual([
        { customerId: 'C1', totalRevenue: 20, transactionCount: 2 },
      ]);
    });

    it('should merge integer and string forms of the same id', () => {
      const result = service.aggregate([tx(1001, 10), tx(' 1001 ', '5.5')]);

      expect(service.toRevenueMap(result)).toEqual({ '1001': 15.5 });
    });

    it('should keep customers whose valid sales are all zero', () => {
      const result = service.aggregate([tx('C9', 0)]);

      expect(service.toRevenueMap(result)).toEqual({ C9: 0 });
    });

    it('should sum exactly where floating point would drift', () => {
      const rows = Array.from({ length: 10 }, () => tx('C1', 0.1));

      expect(service.toRevenueMap(service.aggregate(rows))).toEqual({ C1: 1 });
    });

    it('should total amounts past the double-precision integer range', () => {
      const result = service.aggregate([
        tx('C1', 600000000000),
        tx('C1', 600000000000),
        tx('C2', 1e12),
      ]);

      expect(service.toRevenueMap(result)).toEqual({
        C1: 1200000000000,
        C2: 1000000000000,
      });
      expect(result.grandTotal).toBe(2200000000000);
      expect(result.skipped).toEqual([]);
    });

    it('should consume any iterable in a single pass', () => {
      function* rows(): Generator<TransactionCandidate> {
        yield tx('C1', '1.25');
        yield tx('C2', '2');
        yield tx('C1', '0.75');
      }

      expect(service.toRevenueMap(service.aggregate(rows()))).toEqual({
        C1: 2,
        C2: 2,
      });
    });
  });

  describe('rank()', () => {
    // first-seen order: C, A, B
    const totals = () =>
      service.aggregate([tx('C', 10), tx('A', 10), tx('B', 30)]).totals;

    it('should order by descending revenue, ties by customer id', () => {
      const ranked = service.rank(totals(), SortOrder.REVENUE_DESC);

      expect(ranked.map((t) => [t.customerId, t.rank])).toEqual([
        ['B', 1],
        ['A', 2],
        ['C', 3],
      ]);
    });

    it('should default to descending revenue', () => {
      expect(service.rank(totals()).map((t) => t.customerId)).toEqual([
        'B',
        'A',
        'C',
      ]);
    });

    it('should order by customer id', () => {
      const ranked = service.rank(totals(), SortOrder.CUSTOMER_ID);

      expect(ranked.map((t) => t.customerId)).toEqual(['A', 'B', 'C']);
    });

    it('should keep first-seen order for none', () => {
      const ranked = service.rank(totals(), SortOrder.NONE);

      expect(ranked.map((t) => t.customerId)).toEqual(['C', 'A', 'B']);
    });

    it('should apply the limit after ordering', () => {
      const ranked = service.rank(totals(), SortOrder.REVENUE_DESC, 2);

      expect(ranked).toEqual([
        { customerId: 'B', totalRevenue: 30, transactionCount: 1, rank: 1 },
        { customerId: 'A', totalRevenue: 10, transactionCount: 1, rank: 2 },
      ]);
    });

    it('should not reorder the input array', () => {
      const input = totals();
      service.rank(input, SortOrder.CUSTOMER_ID);

      expect(input.map((t) => t.customerId)).toEqual(['C', 'A', 'B']);
    });
  });

  describe('report()', () => {
    it('should summarise all customers even when the list is limited', () => {
      const report = service.report(
        [
          tx('C1', 30),
          tx('C2', 20),
          tx('C1', 15),
          tx('C3', 'oops'),
          tx(null, 5),
        ],
        { source: 'test', limit: 1 },
      );

      expect(report).toEqual({
        source: 'test',
        sort: SortOrder.REVENUE_DESC,
        customers: [
          { customerId: 'C1', totalRevenue: 45, transactionCount: 2, rank: 1 },
        ],
        summary: {
          transactionsRead: 5,
          transactionsAggregated: 3,
          transactionsSkipped: 2,
          customerCount: 2,
          grandTotal: 65,
        },
        skipped: [
          { index: 3, reason: RejectionReason.INVALID_SALE_AMOUNT },
          { index: 4, reason: RejectionReason.MISSING_CUSTOMER_ID },
        ],
      });
    });
  });
});
