export const INJECTION_TOKENS = {
  APP_CONFIG: Symbol('APP_CONFIG'),
  TRANSACTION_SOURCE: Symbol('TRANSACTION_SOURCE'),
  TRANSACTION_CSV_PARSER: Symbol('TRANSACTION_CSV_PARSER'),
} as const;
