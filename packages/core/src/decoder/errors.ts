import type { DecodeErrorReason } from './types.js';

export class DecodeError extends Error {
  name = 'DecodeError';
  constructor(
    message: string,
    public readonly topic: string,
    public readonly reason: DecodeErrorReason,
  ) {
    super(message);
  }
}
