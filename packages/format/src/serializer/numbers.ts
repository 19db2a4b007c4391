/**
 * Canonical number text: the shortest decimal that reads back as the same
 * double, written without exponent notation since the lexer has none.
 * Whole numbers carry no fraction (`5`, not `5.0`) and -0 is written as `0`.
 * Non-finite numbers have no text form and are written as `null`.
 */
export function formatNumber(value: number): string {
  if (!Number.isFinite(value)) {
    return 'null';
  }
  if (Object.is(value, -0)) {
    return '0';
  }

  const text = String(value);
  const exponentIndex = text.indexOf('e');
  if (exponentIndex === -1) {
    return text;
  }

  return expandExponent(text.slice(0, exponentIndex), Number(text.slice(exponentIndex + 1)));
}

/**
 * Move the decimal point of `mantissa` by `exponent` places
 */
function expandExponent(mantissa: string, exponent: number): string {
  const negative = mantissa.startsWith('-');
  const unsigned = negative ? mantissa.slice(1) : mantissa;
  const pointIndex = unsigned.indexOf('.');
  const digits = unsigned.replace('.', '');
  const integerLength = (pointIndex === -1 ? unsigned.length : pointIndex) + exponent;

  let result: string;
  if (integerLength <= 0) {
    result = `0.${'0'.repeat(-integerLength)}${digits}`;
  } else if (integerLength >= digits.length) {
    result = digits + '0'.repeat(integerLength - digits.length);
  } else {
    result = `${digits.slice(0, integerLength)}.${digits.slice(integerLength)}`;
  }

  return negative ? `-${result}` : result;
}
