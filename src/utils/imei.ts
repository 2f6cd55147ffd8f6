import { randomInt } from 'crypto';

export const IMEI_TAC_PREFIX = '35963208';

export function luhnCheckDigit(digits: string): number {
  let sum = 0;
  let double = true;

  for (let i = digits.length - 1; i >= 0; i--) {
    let digit = digits.charCodeAt(i) - 0x30;
    if (double) {
      digit *= 2;
      if (digit > 9) digit -= 9;
    }
    sum += digit;
    double = !double;
  }

  return (10 - (sum % 10)) % 10;
}

export function isLuhnValid(imei: string): boolean {
  return /^\d+$/.test(imei) && luhnCheckDigit(imei.slice(0, -1)) === Number(imei.slice(-1));
}

/**
 * Random 15-digit IMEI with a fixed TAC prefix and a valid Luhn check digit.
 */
export function generateImei(nextDigit: () => number = () => randomInt(10)): string {
  let body = IMEI_TAC_PREFIX;
  for (let i = 0; i < 6; i++) {
    body += String(nextDigit() % 10);
  }
  return `${body}${luhnCheckDigit(body)}`;
}
