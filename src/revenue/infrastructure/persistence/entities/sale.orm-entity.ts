import { Entity, Column, PrimaryColumn } from 'typeorm';

/** Warehouse fact table, column for column as the ETL load creates it. */
@Entity('fact_sales')
export class SaleEntity {
  @PrimaryColumn({ name: 'transaction_id', type: 'integer' })
  transactionId!: number;

  @Column({ name: 'sale_date', type: 'text', nullable: true })
  saleDate!: string | null;

  @Column({ name: 'customer_id', type: 'integer', nullable: true })
  customerId!: number | null;

  @Column({ name: 'product_id', type: 'integer', nullable: true })
  productId!: number | null;

  @Column({ name: 'store_id', type: 'integer', nullable: true })
  storeId!: number | null;

  @Column({ name: 'campaign_id', type: 'integer', nullable: true })
  campaignId!: number | null;

  @Column({ name: 'sale_amount', type: 'real', nullable: true })
  saleAmount!: number | null;

  @Column({ name: 'discount_percent', type: 'real', nullable: true })
  discountPercent!: number | null;

  @Column({ name: 'payment_type', type: 'text', nullable: true })
  paymentType!: string | null;
}
