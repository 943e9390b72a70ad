import { type PersonalCodeDecoder, PersonalCodeFormatError } from './types.js';

// GYYMMDDSSSC
const FORMAT = /^[1-8]\d{10}$/;

const WEIGHTS_1 = [1, 2, 3, 4, 5, 6, 7, 8, 9, 1];
const WEIGHTS_2 = [3, 4, 5, 6, 7, 8, 9, 1, 2, 3];

function centuryOf(genderDigit: number): number {
  // 1,2 -> 1800; 3,4 -> 1900; 5,6 -> 2000; 7,8 -> 2100
  return 1800 + Math.floor((genderDigit - 1) / 2) * 100;
}

export function checkDigit(first10: string): number {
  const digits = Array.from(first10, Number);
  const weighted = (w: number[]) => digits.reduce((sum, d, i) => sum + d * w[i], 0) % 11;
  const r1 = weighted(WEIGHTS_1);
  if (r1 < 10) return r1;
  const r2 = weighted(WEIGHTS_2);
  return r2 < 10 ? r2 : 0;
}

function decodeDate(code: string): Date | null {
  const year = centuryOf(Number(code[0])) + Number(code.slice(1, 3));
  const month = Number(code.slice(3, 5));
  const day = Number(code.slice(5, 7));
  const d = new Date(year, month - 1, day);
  // Date rolls over invalid days (0230 -> 0302); reject those
  if (d.getFullYear() !== year || d.getMonth() !== month - 1 || d.getDate() !== day) return null;
  return d;
}

export class EstonianPersonalCodeDecoder implements PersonalCodeDecoder {
  isValid(code: string): boolean {
    if (!FORMAT.test(code)) return false;
    if (decodeDate(code) === null) return false;
    return checkDigit(code.slice(0, 10)) === Number(code[10]);
  }

  birthDate(code: string): Date {
    if (!FORMAT.test(code)) throw new PersonalCodeFormatError(`Malformed personal code: expected 11 digits`);
    const d = decodeDate(code);
    if (!d) throw new PersonalCodeFormatError(`Personal code does not encode a calendar date`);
    return d;
  }
}
