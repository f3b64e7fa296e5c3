export class CustomerRevenueNotFoundException extends Error {
  constructor(customerId: string) {
    super(`No revenue recorded for customer '${customerId}'`);
    this.name = 'CustomerRevenueNotFoundException';
  }
}
