export class KeyGenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'KeyGenerationError';
  }
}
