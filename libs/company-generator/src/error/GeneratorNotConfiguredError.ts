export class GeneratorNotConfiguredError extends Error {
  constructor() {
    super('GEMINI_API_KEY is not configured');
    this.name = 'GeneratorNotConfiguredError';
  }
}
