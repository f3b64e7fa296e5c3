export class InvalidCsvException extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCsvException';
  }
}
