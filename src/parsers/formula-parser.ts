import type { ElementSymbol, FormulaParseResult, ParseError } from 'types';
import { defaultChemistryTables, type ChemistryTables } from 'src/config/chemistry-tables';

const SUBSCRIPT_DIGITS = '₀₁₂₃₄₅₆₇₈₉';
const SUPERSCRIPT_DIGITS = '⁰¹²³⁴⁵⁶⁷⁸⁹';
const HYDRATE_SEPARATORS = new Set(['·', '•', '*', '.']);
const CLOSING: Record<string, string> = { '(': ')', '[': ']' };

function asciiDigit(ch: string): string | undefined {
  if (ch >= '0' && ch <= '9') return ch;
  const sub = SUBSCRIPT_DIGITS.indexOf(ch);
  return sub >= 0 ? String(sub) : undefined;
}

export function toAsciiDigits(text: string): string {
  let out = '';
  for (const ch of text) out += asciiDigit(ch) ?? ch;
  return out;
}

export function superscriptCharge(charge: number): string {
  if (charge === 0) return '';
  const magnitude = Math.abs(charge);
  const digits = magnitude === 1 ? '' : [...String(magnitude)].map(d => SUPERSCRIPT_DIGITS[Number(d)]).join('');
  return `${digits}${charge > 0 ? '⁺' : '⁻'}`;
}

interface ChargeSplit {
  body: string;
  charge: number;
  error?: ParseError;
}

/**
 * Strip a trailing charge: `Fe^3+`, `SO4^2-`, `Fe³⁺`, `Cl⁻`, `Na+`, `Ca++`, `NH4+`.
 * A single element with digits before a bare sign (`Fe3+`) is ambiguous and
 * reported; the digits stay an atom count.
 */
function splitCharge(text: string): ChargeSplit {
  const caret = /\^(\d*)([+-])$|\^([+-])(\d*)$/.exec(text);
  if (caret) {
    const digits = caret[1] ?? caret[4] ?? '';
    const sign = (caret[2] ?? caret[3]) === '-' ? -1 : 1;
    return { body: text.slice(0, caret.index), charge: sign * (digits ? Number(digits) : 1) };
  }

  const superscript = /([⁰¹²³⁴⁵⁶⁷⁸⁹]*)([⁺⁻])$/.exec(text);
  if (superscript) {
    const digits = [...(superscript[1] ?? '')].map(d => SUPERSCRIPT_DIGITS.indexOf(d)).join('');
    const sign = superscript[2] === '⁻' ? -1 : 1;
    return { body: text.slice(0, superscript.index), charge: sign * (digits ? Number(digits) : 1) };
  }

  const bare = /[+-]+$/.exec(text);
  if (bare) {
    const signs = bare[0];
    if (new Set(signs).size > 1) {
      return {
        body: text.slice(0, bare.index),
        charge: 0,
        error: { message: `Mixed charge signs: ${signs}`, position: bare.index },
      };
    }
    const sign = signs[0] === '-' ? -1 : 1;
    const body = text.slice(0, bare.index);
    const monatomic = /^([A-Z][a-z]?)(\d+)$/.exec(body);
    if (monatomic) {
      const [, symbol, digits] = monatomic;
      return {
        body,
        charge: 0,
        error: {
          message: `Ambiguous charge in ${text}: write ${symbol}^${digits}${signs} or ${symbol}${superscriptCharge(sign * Number(digits))} for an ion`,
          position: bare.index,
        },
      };
    }
    return { body, charge: sign * signs.length };
  }

  return { body: text, charge: 0 };
}

class FormulaScanner {
  private pos = 0;

  constructor(
    private readonly text: string,
    private readonly offset: number,
    private readonly tables: ChemistryTables,
    private readonly errors: ParseError[],
  ) {}

  readCount(): number | undefined {
    let digits = '';
    while (this.pos < this.text.length) {
      const d = asciiDigit(this.text[this.pos]!);
      if (d === undefined) break;
      digits += d;
      this.pos++;
    }
    return digits ? Number(digits) : undefined;
  }

  /** Parse until `closing` (or end of input when undefined) */
  readGroup(closing?: string): { counts: Map<ElementSymbol, number>; closed: boolean } {
    const counts = new Map<ElementSymbol, number>();

    while (this.pos < this.text.length) {
      const ch = this.text[this.pos]!;

      if (ch === closing) {
        this.pos++;
        return { counts, closed: true };
      }

      if (ch === '(' || ch === '[') {
        const openedAt = this.pos;
        this.pos++;
        const { counts: inner, closed } = this.readGroup(CLOSING[ch]);
        if (!closed) {
          this.errors.push({ message: `Unclosed '${ch}'`, position: this.offset + openedAt });
        }
        if (inner.size === 0) {
          this.errors.push({ message: 'Empty group', position: this.offset + openedAt });
        }
        const multiplier = this.readMultiplier();
        for (const [symbol, n] of inner) addCount(counts, symbol, n * multiplier);
        continue;
      }

      if (ch === ')' || ch === ']') {
        this.errors.push({ message: `Unmatched '${ch}'`, position: this.offset + this.pos });
        this.pos++;
        continue;
      }

      if (ch >= 'A' && ch <= 'Z') {
        const symbolAt = this.pos;
        let symbol = ch;
        this.pos++;
        const next = this.text[this.pos];
        if (next !== undefined && next >= 'a' && next <= 'z') {
          symbol += next;
          this.pos++;
        }
        if (!this.tables.elements.has(symbol)) {
          this.errors.push({ message: `Unknown element: ${symbol}`, position: this.offset + symbolAt });
        }
        addCount(counts, symbol, this.readMultiplier());
        continue;
      }

      this.errors.push({ message: `Unexpected character: ${ch}`, position: this.offset + this.pos });
      this.pos++;
    }

    return { counts, closed: closing === undefined };
  }

  private readMultiplier(): number {
    const at = this.pos;
    const n = this.readCount();
    if (n === undefined) return 1;
    if (n === 0) {
      this.errors.push({ message: 'Atom count must be positive', position: this.offset + at });
      return 1;
    }
    return n;
  }
}

function addCount(counts: Map<ElementSymbol, number>, symbol: ElementSymbol, n: number): void {
  counts.set(symbol, (counts.get(symbol) ?? 0) + n);
}

/**
 * Parse a written formula into an ordered element -> count map plus charge.
 * Supports nested ( ) and [ ] groups, hydrate dots (CuSO4·5H2O) and
 * caret, superscript or bare-sign charges.
 */
export function parseFormula(input: string, tables: ChemistryTables = defaultChemistryTables()): FormulaParseResult {
  const errors: ParseError[] = [];
  const composition = new Map<ElementSymbol, number>();
  const text = input.trim();

  if (!text) {
    return { composition, charge: 0, sourceFormula: '', errors: [{ message: 'Empty formula', position: 0 }] };
  }

  const leading = input.length - input.trimStart().length;
  const { body, charge, error } = splitCharge(text);
  if (error) errors.push({ ...error, position: leading + error.position });

  let segmentStart = 0;
  const segments: { text: string; offset: number }[] = [];
  for (let i = 0; i <= body.length; i++) {
    if (i === body.length || HYDRATE_SEPARATORS.has(body[i]!)) {
      segments.push({ text: body.slice(segmentStart, i), offset: leading + segmentStart });
      segmentStart = i + 1;
    }
  }

  for (const segment of segments) {
    if (!segment.text) {
      errors.push({ message: 'Empty formula segment', position: segment.offset });
      continue;
    }
    const scanner = new FormulaScanner(segment.text, segment.offset, tables, errors);
    const multiplier = scanner.readCount() ?? 1;
    if (multiplier === 0) {
      errors.push({ message: 'Hydrate multiplier must be positive', position: segment.offset });
    }
    const { counts } = scanner.readGroup();
    if (counts.size === 0) {
      errors.push({ message: 'No elements in formula segment', position: segment.offset });
    }
    for (const [symbol, n] of counts) addCount(composition, symbol, n * (multiplier || 1));
  }

  if (process.env.VERBOSE) {
    console.log(`[formula-parser] ${input} ->`, Object.fromEntries(composition), `charge=${charge}`);
  }

  return { composition, charge, sourceFormula: toAsciiDigits(body), errors };
}
