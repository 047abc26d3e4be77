/**
 * Number Words
 *
 * Surface forms of chapter numbers ("seven", "twenty-one", "one hundred and
 * five", "two-hundred-twelve") mapped to decimal strings. Built once on first
 * use and frozen; shared by every resolver call.
 */

const ONES = [
  'one',
  'two',
  'three',
  'four',
  'five',
  'six',
  'seven',
  'eight',
  'nine',
];

const TEENS = [
  'ten',
  'eleven',
  'twelve',
  'thirteen',
  'fourteen',
  'fifteen',
  'sixteen',
  'seventeen',
  'eighteen',
  'nineteen',
];

const TENS = [
  'twenty',
  'thirty',
  'forty',
  'fifty',
  'sixty',
  'seventy',
  'eighty',
  'ninety',
];

let numberWordTable: Readonly<Record<string, string>> | null = null;
let numberWordPattern: string | null = null;

/**
 * Canonical hyphenated spelling of 1..99 ("seven", "fourteen", "forty-two")
 */
function spellBelowHundred(n: number): string {
  if (n < 10) {
    return ONES[n - 1];
  }
  if (n < 20) {
    return TEENS[n - 10];
  }
  const tens = TENS[Math.floor(n / 10) - 2];
  const ones = n % 10;
  return ones === 0 ? tens : `${tens}-${ONES[ones - 1]}`;
}

function buildNumberWordTable(): Record<string, string> {
  const table: Record<string, string> = { hundred: '100' };

  for (let n = 1; n < 20; n++) {
    table[spellBelowHundred(n)] = String(n);
  }

  TENS.forEach((tens, index) => {
    const base = (index + 2) * 10;
    table[tens] = String(base);
    ONES.forEach((ones, offset) => {
      const value = String(base + offset + 1);
      table[`${tens}-${ones}`] = value;
      table[`${tens} ${ones}`] = value;
    });
  });

  for (let h = 1; h <= 3; h++) {
    const hundreds = `${ONES[h - 1]} hundred`;
    table[hundreds] = String(h * 100);
    table[`${hundreds} and`] = String(h * 100);

    for (let j = 1; j < 100; j++) {
      const value = String(h * 100 + j);
      const tail = spellBelowHundred(j);
      for (const form of [`${hundreds} ${tail}`, `${hundreds} and ${tail}`]) {
        table[form] = value;
        table[form.replace(/ /g, '-')] = value;
      }
    }
  }

  return table;
}

export function getNumberWordTable(): Readonly<Record<string, string>> {
  if (!numberWordTable) {
    numberWordTable = Object.freeze(buildNumberWordTable());
  }
  return numberWordTable;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Regex alternation of every number word, longest first so that
 * "twenty-one" wins over "twenty"
 */
export function getNumberWordPattern(): string {
  if (!numberWordPattern) {
    numberWordPattern = Object.keys(getNumberWordTable())
      .sort((a, b) => b.length - a.length || a.localeCompare(b))
      .map(escapeRegExp)
      .join('|');
  }
  return numberWordPattern;
}

/**
 * Decimal string for a digit run or number word, null when unknown
 */
export function toChapterNumber(token: string): string | null {
  const normalized = token.trim().toLowerCase().replace(/\s+/g, ' ');
  if (/^\d+$/.test(normalized)) {
    return normalized;
  }
  const table = getNumberWordTable();
  return Object.hasOwn(table, normalized) ? table[normalized] : null;
}
