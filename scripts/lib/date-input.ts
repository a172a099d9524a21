import * as readline from 'readline';

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

function buildDate(year: number, month: number, day: number): Date | null {
  const date = new Date(year, month - 1, day);
  // Rejects 31/02 and friends, which Date would roll over into March
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Parse an operator-typed date. Accepts dd/mm/aaaa or mm-dd-aaaa.
 */
export function parseDateInput(text: string): Date | null {
  const value = text.trim();

  const br = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(value);
  if (br) {
    return buildDate(parseInt(br[3], 10), parseInt(br[2], 10), parseInt(br[1], 10));
  }

  const us = /^(\d{1,2})-(\d{1,2})-(\d{4})$/.exec(value);
  if (us) {
    return buildDate(parseInt(us[3], 10), parseInt(us[1], 10), parseInt(us[2], 10));
  }

  return null;
}

/** mm-dd-aaaa */
export function formatSqlDate(date: Date): string {
  return `${pad(date.getMonth() + 1)}-${pad(date.getDate())}-${date.getFullYear()}`;
}

/** dd/mm/aaaa */
export function formatDisplayDate(date: Date): string {
  return `${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${date.getFullYear()}`;
}

/** yyyymmdd, used in generated file names */
export function formatDateStamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

function ask(rl: readline.Interface, message: string): Promise<string> {
  return new Promise(resolve => rl.question(message, resolve));
}

/**
 * Keep asking until the operator types a valid date
 */
export async function promptDate(rl: readline.Interface, message: string): Promise<Date> {
  for (;;) {
    const answer = await ask(rl, message);
    const date = parseDateInput(answer);
    if (date) {
      return date;
    }
    console.log('Formato inválido. Use dd/mm/aaaa ou mm-dd-aaaa.');
  }
}
