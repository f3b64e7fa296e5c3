export enum SortOrder {
  REVENUE_DESC = 'revenue_desc',
  CUSTOMER_ID = 'customer_id',
  NONE = 'none',
}
