/**
 * Line classification for the block parser.
 *
 * Every line is tested against the structural patterns in a fixed order
 * (see CLASSIFIERS below); the first match wins and anything unmatched is a
 * paragraph line. Matching is done with anchored character scans so the
 * precedence lives in one table instead of in regex alternation.
 */

export type LineClass =
  | { kind: 'blank' }
  | { kind: 'fence'; language: string }
  | { kind: 'heading'; level: number; text: string }
  | { kind: 'rule' }
  | { kind: 'quote'; depth: number; text: string }
  | { kind: 'checkbox'; checked: boolean; text: string }
  | { kind: 'bullet'; marker: string; text: string }
  | { kind: 'numbered'; number: number; text: string }
  | { kind: 'marker'; marker: string; text: string }
  | { kind: 'paragraph'; text: string };

export type ListItemClass = Extract<LineClass, { kind: 'checkbox' | 'bullet' | 'numbered' | 'marker' }>;

const MAX_HEADING_LEVEL = 6;
const MIN_RULE_LENGTH = 3;
const MIN_MARKER_LENGTH = 3;
const FENCE = '```';

function isWhitespace(ch: string): boolean {
  return ch !== '' && ch.trim() === '';
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9' && ch.length === 1;
}

function isUpper(ch: string): boolean {
  return ch >= 'A' && ch <= 'Z' && ch.length === 1;
}

function isWordChar(ch: string): boolean {
  return isDigit(ch) || isUpper(ch) || (ch >= 'a' && ch <= 'z' && ch.length === 1) || ch === '_';
}

function isMarkerChar(ch: string): boolean {
  return isUpper(ch) || isDigit(ch) || ch === '_' || ch === '-';
}

function isBulletChar(ch: string): boolean {
  return ch === '-' || ch === '*' || ch === '+';
}

function isRuleChar(ch: string): boolean {
  return ch === '-' || ch === '*' || ch === '_';
}

function skipWhitespace(line: string, from = 0): number {
  let i = from;
  while (isWhitespace(line.charAt(i))) i++;
  return i;
}

/**
 * Returns the text following a required whitespace run at `from`,
 * or null when there is no whitespace or nothing but whitespace after it.
 */
function textAfterWhitespace(line: string, from: number): string | null {
  const start = skipWhitespace(line, from);
  if (start === from) return null;
  const text = line.slice(start);
  return text.trim() ? text : null;
}

function matchBlank(line: string): LineClass | null {
  return line.trim() === '' ? { kind: 'blank' } : null;
}

function matchFence(line: string): LineClass | null {
  const start = skipWhitespace(line);
  if (!line.startsWith(FENCE, start)) return null;
  let end = start + FENCE.length;
  while (isWordChar(line.charAt(end))) end++;
  return { kind: 'fence', language: line.slice(start + FENCE.length, end) };
}

function matchHeading(line: string): LineClass | null {
  let hashes = 0;
  while (line.charAt(hashes) === '#') hashes++;
  if (hashes === 0 || hashes > MAX_HEADING_LEVEL) return null;
  if (!isWhitespace(line.charAt(hashes))) return null;
  // at least one character must follow the first whitespace
  if (line.length <= hashes + 1) return null;
  return { kind: 'heading', level: hashes, text: line.trim() };
}

function matchRule(line: string): LineClass | null {
  const start = skipWhitespace(line);
  let end = start;
  while (isRuleChar(line.charAt(end))) end++;
  if (end - start < MIN_RULE_LENGTH) return null;
  return skipWhitespace(line, end) === line.length ? { kind: 'rule' } : null;
}

function matchQuote(line: string): LineClass | null {
  const start = skipWhitespace(line);
  let end = start;
  while (line.charAt(end) === '>') end++;
  if (end === start) return null;
  return { kind: 'quote', depth: end - start, text: line.slice(end).trim() };
}

function matchCheckbox(line: string): LineClass | null {
  const start = skipWhitespace(line);
  if (!isBulletChar(line.charAt(start))) return null;
  const open = skipWhitespace(line, start + 1);
  if (open === start + 1 || line.charAt(open) !== '[') return null;
  const state = line.charAt(open + 1);
  if (state !== ' ' && state !== 'x' && state !== 'X') return null;
  if (line.charAt(open + 2) !== ']') return null;
  // the text may be empty; an unlabeled box is still a task
  const textStart = skipWhitespace(line, open + 3);
  if (textStart === open + 3) return null;
  return { kind: 'checkbox', checked: state !== ' ', text: line.slice(textStart) };
}

function matchBullet(line: string): LineClass | null {
  const start = skipWhitespace(line);
  const marker = line.charAt(start);
  if (!isBulletChar(marker)) return null;
  const text = textAfterWhitespace(line, start + 1);
  return text === null ? null : { kind: 'bullet', marker, text };
}

function matchNumbered(line: string): LineClass | null {
  const start = skipWhitespace(line);
  let end = start;
  while (isDigit(line.charAt(end))) end++;
  if (end === start || line.charAt(end) !== '.') return null;
  const text = textAfterWhitespace(line, end + 1);
  if (text === null) return null;
  return { kind: 'numbered', number: parseInt(line.slice(start, end), 10), text };
}

function matchMarker(line: string): LineClass | null {
  const start = skipWhitespace(line);
  if (!isUpper(line.charAt(start))) return null;
  let end = start + 1;
  while (isMarkerChar(line.charAt(end))) end++;
  // two-letter tokens are abbreviations (region codes etc.), not status markers
  if (end - start < MIN_MARKER_LENGTH) return null;
  const text = textAfterWhitespace(line, end);
  if (text === null) return null;
  return { kind: 'marker', marker: line.slice(start, end), text };
}

/**
 * Decision table, in priority order.
 */
const CLASSIFIERS: ReadonlyArray<(line: string) => LineClass | null> = [
  matchBlank,
  matchFence,
  matchHeading,
  matchRule,
  matchQuote,
  matchCheckbox,
  matchBullet,
  matchNumbered,
  matchMarker
];

/**
 * Classify a single line. Total: unmatched lines are paragraphs.
 */
export function classifyLine(line: string): LineClass {
  for (const classify of CLASSIFIERS) {
    const result = classify(line);
    if (result) return result;
  }
  return { kind: 'paragraph', text: line.trim() };
}

/**
 * True for a line that closes an open fenced code block.
 */
export function isFenceClose(line: string): boolean {
  return line.trim() === FENCE;
}

/**
 * Indentation depth of a line: spaces count 1, tabs count 2, two per level.
 */
export function indentDepth(line: string): number {
  let spaces = 0;
  for (const ch of line) {
    if (ch === ' ') {
      spaces += 1;
    } else if (ch === '\t') {
      spaces += 2;
    } else {
      break;
    }
  }
  return Math.floor(spaces / 2);
}

export function isListItem(cls: LineClass): cls is ListItemClass {
  return cls.kind === 'checkbox' || cls.kind === 'bullet' || cls.kind === 'numbered' || cls.kind === 'marker';
}

/**
 * Structural lines that end a list item's scan regardless of indentation.
 */
export function endsListScan(cls: LineClass): boolean {
  return cls.kind === 'heading' || cls.kind === 'fence' || cls.kind === 'rule' || cls.kind === 'quote';
}

/**
 * Lines that stop a running paragraph. A capitalized marker does not.
 */
export function breaksParagraph(cls: LineClass): boolean {
  switch (cls.kind) {
    case 'heading':
    case 'bullet':
    case 'numbered':
    case 'checkbox':
    case 'quote':
    case 'rule':
    case 'fence':
      return true;
    default:
      return false;
  }
}

/**
 * Block text for a list-like line. Markers are dropped since every block is
 * already rendered as a bullet; checkboxes become TODO/DONE.
 */
export function listItemContent(cls: ListItemClass): string {
  switch (cls.kind) {
    case 'checkbox': {
      const status = cls.checked ? 'DONE' : 'TODO';
      let text = cls.text.trim();
      if (text.startsWith('TODO:') || text.startsWith('DONE:')) {
        text = text.slice(5).trim();
      }
      return text ? `${status} ${text}` : status;
    }
    case 'bullet':
    case 'numbered':
      return cls.text;
    case 'marker':
      return `${cls.marker} ${cls.text}`;
  }
}
