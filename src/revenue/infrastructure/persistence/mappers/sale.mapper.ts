import { TransactionCandidate } from '../../../domain/entities/transaction.entity';
import { SaleEntity } from '../entities/sale.orm-entity';

export class SaleMapper {
  static toCandidate(orm: SaleEntity): TransactionCandidate {
    return {
      customerId: orm.customerId,
      saleAmount: orm.saleAmount,
    };
  }
}
