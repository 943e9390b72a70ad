/**
 * Jurisdiction-specific identity code support. The decision engine only ever
 * talks to this interface.
 */
export interface PersonalCodeDecoder {
  /** Structural and checksum validity. */
  isValid(code: string): boolean;
  /** Birth date encoded in the code; throws when the code cannot be decoded. */
  birthDate(code: string): Date;
}

export class PersonalCodeFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PersonalCodeFormatError';
  }
}
