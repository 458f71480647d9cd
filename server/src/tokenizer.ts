import { FormulaError } from './errors.js';

export type ArithOp = '+' | '-' | '*' | '/' | '^';
export type CompareOp = '=' | '<>' | '<' | '<=' | '>' | '>=';

export type Tok =
  | { t: 'num'; v: number; at: number }
  | { t: 'str'; v: string; at: number }
  | { t: 'id'; v: string; at: number }
  | { t: 'op'; v: ArithOp; at: number }
  | { t: 'cmp'; v: CompareOp; at: number }
  | { t: 'colon'; at: number }
  | { t: 'comma'; at: number }
  | { t: 'lparen'; at: number }
  | { t: 'rparen'; at: number }
  | { t: 'eof'; at: number };

const isDigit = (ch: string | undefined) => ch !== undefined && ch >= '0' && ch <= '9';
const isIdStart = (ch: string) => /[A-Za-z_$]/.test(ch);
const isIdPart = (ch: string | undefined) => ch !== undefined && /[A-Za-z0-9_$.]/.test(ch);
const isArith = (ch: string): ch is ArithOp => ch === '+' || ch === '-' || ch === '*' || ch === '/' || ch === '^';

export function tokenize(src: string): Tok[] {
  const s = src;
  const out: Tok[] = [];
  let i = 0;
  while (i < s.length) {
    const ch = s[i];
    if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') { i++; continue; }
    if (isArith(ch)) { out.push({ t: 'op', v: ch, at: i }); i++; continue; }
    if (ch === '<') {
      if (s[i + 1] === '=') { out.push({ t: 'cmp', v: '<=', at: i }); i += 2; }
      else if (s[i + 1] === '>') { out.push({ t: 'cmp', v: '<>', at: i }); i += 2; }
      else { out.push({ t: 'cmp', v: '<', at: i }); i++; }
      continue;
    }
    if (ch === '>') {
      if (s[i + 1] === '=') { out.push({ t: 'cmp', v: '>=', at: i }); i += 2; }
      else { out.push({ t: 'cmp', v: '>', at: i }); i++; }
      continue;
    }
    if (ch === '=') { out.push({ t: 'cmp', v: '=', at: i }); i++; continue; }
    if (ch === ':') { out.push({ t: 'colon', at: i }); i++; continue; }
    if (ch === ',') { out.push({ t: 'comma', at: i }); i++; continue; }
    if (ch === '(') { out.push({ t: 'lparen', at: i }); i++; continue; }
    if (ch === ')') { out.push({ t: 'rparen', at: i }); i++; continue; }
    if (ch === '"') {
      let j = i + 1, text = '';
      for (;;) {
        if (j >= s.length) throw new FormulaError('syntax', `Unterminated string at ${i}`);
        if (s[j] === '"') {
          if (s[j + 1] === '"') { text += '"'; j += 2; continue; }
          break;
        }
        text += s[j++];
      }
      out.push({ t: 'str', v: text, at: i });
      i = j + 1;
      continue;
    }
    if (isDigit(ch) || (ch === '.' && isDigit(s[i + 1]))) {
      let j = i;
      while (isDigit(s[j])) j++;
      if (s[j] === '.') { j++; while (isDigit(s[j])) j++; }
      if ((s[j] === 'e' || s[j] === 'E') && (isDigit(s[j + 1]) || ((s[j + 1] === '+' || s[j + 1] === '-') && isDigit(s[j + 2])))) {
        j += 2;
        while (isDigit(s[j])) j++;
      }
      out.push({ t: 'num', v: parseFloat(s.slice(i, j)), at: i });
      i = j;
      continue;
    }
    if (isIdStart(ch)) {
      let j = i + 1;
      while (isIdPart(s[j])) j++;
      out.push({ t: 'id', v: s.slice(i, j).toUpperCase(), at: i });
      i = j;
      continue;
    }
    throw new FormulaError('syntax', `Unexpected '${ch}' at ${i}`, ch);
  }
  out.push({ t: 'eof', at: s.length });
  return out;
}
