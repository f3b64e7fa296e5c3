export enum RejectionReason {
  MISSING_CUSTOMER_ID = 'MISSING_CUSTOMER_ID',
  INVALID_CUSTOMER_ID = 'INVALID_CUSTOMER_ID',
  MISSING_SALE_AMOUNT = 'MISSING_SALE_AMOUNT',
  INVALID_SALE_AMOUNT = 'INVALID_SALE_AMOUNT',
  NEGATIVE_SALE_AMOUNT = 'NEGATIVE_SALE_AMOUNT',
}
