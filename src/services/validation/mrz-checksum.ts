/**
 * ICAO 9303 checksum: for each character position, value is 0-9 for digits,
 * 10-35 for A-Z, 0 for the filler '<'. Weights 7,3,1 repeated; the check
 * digit is the weighted sum mod 10. Returns -1 for characters outside the
 * MRZ alphabet.
 */
export function icaoCheckDigit(str: string): number {
  const weights = [7, 3, 1];
  let sum = 0;
  for (let i = 0; i < str.length; i++) {
    const c = str[i];
    if (c === undefined) return -1;
    let val: number;
    if (c >= '0' && c <= '9') val = parseInt(c, 10);
    else if (c >= 'A' && c <= 'Z') val = c.charCodeAt(0) - 55;
    else if (c === '<') val = 0;
    else return -1;
    sum += val * (weights[i % 3] ?? 0);
  }
  return sum % 10;
}

export function hasValidCheckDigit(data: string, checkChar: string | undefined): boolean {
  if (!checkChar || !/^[0-9]$/.test(checkChar)) return false;
  const computed = icaoCheckDigit(data);
  return computed >= 0 && computed === parseInt(checkChar, 10);
}

/**
 * Reads the document number from the second line of a TD3 MRZ (positions 1-9,
 * check digit at 10). Returns undefined unless the check digit verifies.
 */
export function documentNumberFromMrz(mrzLine2: string): string | undefined {
  const line = mrzLine2.trim();
  if (line.length < 10) return undefined;
  const number = line.slice(0, 9).replace(/</g, '').trim();
  if (!number) return undefined;
  return hasValidCheckDigit(number.padEnd(9, '<'), line[9]) ? number : undefined;
}
