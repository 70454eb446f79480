import type { Declarations, ModuleId } from './types.js';
import { ParseError } from '../utils/error-handler.js';

const IDENT = '[\\p{L}_][\\p{L}\\p{N}_]*';
const DOTTED_NAME = `${IDENT}(?:\\s*\\.\\s*${IDENT})*`;

const IMPORT_REGEX = /^import\s+(.+)$/su;
const FROM_IMPORT_REGEX = /^from\s+(\.*)\s*(.*?)\s+import\s+(.+)$/su;
const ALIASED_DOTTED_REGEX = new RegExp(`^(${DOTTED_NAME})(?:\\s+as\\s+${IDENT})?$`, 'u');
const ALIASED_NAME_REGEX = new RegExp(`^${IDENT}(?:\\s+as\\s+${IDENT})?$`, 'u');
const DOTTED_NAME_REGEX = new RegExp(`^${DOTTED_NAME}$`, 'u');
const IMPORT_KEYWORD_REGEX = /^(import|from)(\s|$)/;
const CLASS_DEF_REGEX = new RegExp(`^class\\s+(${IDENT})`, 'u');
const FUNCTION_DEF_REGEX = new RegExp(`^(?:async\\s+)?def\\s+(${IDENT})`, 'u');
const BLOCK_OPENER_REGEX =
  /^(?:async\s+)?(if|elif|else|while|for|with|def|class|try|except|finally)(?=[\s:(\[]|$)/;
const BARE_OPENERS = new Set(['else', 'try', 'finally']);
const DOUBLED_ASSIGNMENT_REGEX = /=\s+=/;

export interface Statement {
  text: string;
  line: number;
}

const OPENING_BRACKETS = new Set(['(', '[', '{']);
const CLOSING_BRACKETS = new Set([')', ']', '}']);

/**
 * Splits Python source into simple statements: comments dropped, string
 * literals collapsed to `""`, bracketed and backslash-continued lines joined,
 * and `;`-separated statements split apart.
 */
export function splitStatements(sourceCode: string, filePath: string): Statement[] {
  const statements: Statement[] = [];
  const source = sourceCode.replace(/\r\n?/g, '\n');

  let current = '';
  let startLine = 1;
  let line = 1;
  let depth = 0;
  let i = 0;

  const flush = () => {
    const text = current.trim();
    if (text) {
      statements.push({ text, line: startLine });
    }
    current = '';
    startLine = line;
  };

  while (i < source.length) {
    const ch = source[i];

    if (ch === '#') {
      while (i < source.length && source[i] !== '\n') i++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const triple = source.startsWith(ch.repeat(3), i);
      const quote = triple ? ch.repeat(3) : ch;
      const openedAt = line;
      i += quote.length;
      let closed = false;
      while (i < source.length) {
        if (source[i] === '\\') {
          if (source[i + 1] === '\n') line++;
          i += 2;
          continue;
        }
        if (source.startsWith(quote, i)) {
          i += quote.length;
          closed = true;
          break;
        }
        if (source[i] === '\n') {
          if (!triple) break;
          line++;
        }
        i++;
      }
      if (!closed) {
        throw new ParseError(
          `Syntax error in ${filePath}: unterminated string literal at line ${openedAt}`
        );
      }
      current += '""';
      continue;
    }

    if (ch === '\\' && source[i + 1] === '\n') {
      current += ' ';
      line++;
      i += 2;
      continue;
    }

    if (OPENING_BRACKETS.has(ch)) {
      depth++;
    } else if (CLOSING_BRACKETS.has(ch)) {
      depth--;
      if (depth < 0) {
        throw new ParseError(
          `Syntax error in ${filePath}: unmatched '${ch}' at line ${line}`
        );
      }
    }

    if (ch === '\n') {
      line++;
      i++;
      if (depth === 0) {
        flush();
      } else {
        current += ' ';
      }
      continue;
    }

    if (ch === ';' && depth === 0) {
      i++;
      flush();
      continue;
    }

    current += ch;
    i++;
  }

  if (depth > 0) {
    throw new ParseError(`Syntax error in ${filePath}: unexpected end of file inside brackets`);
  }
  flush();

  return statements;
}

function syntaxError(filePath: string, statement: Statement, problem: string): ParseError {
  return new ParseError(
    `Syntax error in ${filePath}: ${problem} at line ${statement.line}`,
    statement.text
  );
}

/** Index of the colon that ends a block header, ignoring `:=` and bracketed colons. */
function findHeaderColon(text: string): number {
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (OPENING_BRACKETS.has(ch)) {
      depth++;
    } else if (CLOSING_BRACKETS.has(ch)) {
      depth--;
    } else if (ch === ':' && depth === 0 && text[i + 1] !== '=') {
      return i;
    }
  }
  return -1;
}

function checkSimpleStatement(statement: Statement, filePath: string): void {
  if (DOUBLED_ASSIGNMENT_REGEX.test(statement.text)) {
    throw syntaxError(filePath, statement, 'invalid assignment');
  }
  if (/[^=!<>]=$|^=$/.test(statement.text)) {
    throw syntaxError(filePath, statement, 'missing assignment value');
  }
}

/**
 * Breaks a statement into its block header and the statement that follows
 * the header's colon on the same line (`if ready: import b`), checking that
 * every block opener ends in a colon.
 */
export function expandStatement(statement: Statement, filePath: string): Statement[] {
  const opener = statement.text.match(BLOCK_OPENER_REGEX);
  if (!opener) {
    checkSimpleStatement(statement, filePath);
    return [statement];
  }

  const colon = findHeaderColon(statement.text);
  if (colon < 0) {
    throw syntaxError(filePath, statement, `expected ':' after '${opener[1]}'`);
  }

  const header = { text: statement.text.slice(0, colon).trim(), line: statement.line };
  if (BARE_OPENERS.has(opener[1]) && header.text !== opener[1]) {
    throw syntaxError(filePath, statement, `unexpected text after '${opener[1]}'`);
  }
  checkSimpleStatement(header, filePath);

  const body = statement.text.slice(colon + 1).trim();
  if (!body) {
    return [header];
  }
  return [header, ...expandStatement({ text: body, line: statement.line }, filePath)];
}

/** Simple statements of a file, with one-line block bodies split from their headers. */
export function readStatements(sourceCode: string, filePath: string): Statement[] {
  return splitStatements(sourceCode, filePath).flatMap((statement) =>
    expandStatement(statement, filePath)
  );
}

function compactDottedName(name: string): string {
  return name.replace(/\s+/g, '');
}

function invalidImport(filePath: string, statement: Statement): ParseError {
  return new ParseError(
    `Syntax error in ${filePath}: invalid import statement at line ${statement.line}`,
    statement.text
  );
}

/**
 * Returns the module names an import statement refers to: every dotted name
 * of `import a.b, c as d`, or the from-module of `from x.y import z` (leading
 * dots of relative imports dropped). Non-import statements yield nothing.
 */
export function parseImportStatement(statement: Statement, filePath: string): string[] {
  if (!IMPORT_KEYWORD_REGEX.test(statement.text)) {
    return [];
  }

  const fromMatch = statement.text.match(FROM_IMPORT_REGEX);
  if (fromMatch) {
    const [, dots, moduleName, targets] = fromMatch;
    if (moduleName && !DOTTED_NAME_REGEX.test(moduleName)) {
      throw invalidImport(filePath, statement);
    }
    if (!dots && !moduleName) {
      throw invalidImport(filePath, statement);
    }
    if (!isValidImportTargets(targets)) {
      throw invalidImport(filePath, statement);
    }
    return moduleName ? [compactDottedName(moduleName)] : [];
  }

  const importMatch = statement.text.match(IMPORT_REGEX);
  if (importMatch) {
    const names: string[] = [];
    for (const part of importMatch[1].split(',')) {
      const aliased = part.trim().match(ALIASED_DOTTED_REGEX);
      if (!aliased) {
        throw invalidImport(filePath, statement);
      }
      names.push(compactDottedName(aliased[1]));
    }
    return names;
  }

  throw invalidImport(filePath, statement);
}

function isValidImportTargets(targets: string): boolean {
  let body = targets.trim();
  if (body === '*') return true;
  if (body.startsWith('(')) {
    if (!body.endsWith(')')) return false;
    body = body.slice(1, -1).trim().replace(/,$/, '');
  }
  if (!body) return false;
  return body.split(',').every((part) => ALIASED_NAME_REGEX.test(part.trim()));
}

export function extractPythonImports(
  sourceCode: string,
  filePath: string,
  knownIds: ReadonlySet<ModuleId>
): Set<ModuleId> {
  const imports = new Set<ModuleId>();

  for (const statement of readStatements(sourceCode, filePath)) {
    for (const name of parseImportStatement(statement, filePath)) {
      if (knownIds.has(name)) {
        imports.add(name);
      }
    }
  }

  return imports;
}

export function extractPythonDeclarations(
  sourceCode: string,
  filePath: string
): Declarations {
  const classes: string[] = [];
  const functions: string[] = [];

  for (const statement of readStatements(sourceCode, filePath)) {
    // Imports are validated so a malformed one rejects the file.
    parseImportStatement(statement, filePath);

    const classMatch = statement.text.match(CLASS_DEF_REGEX);
    if (classMatch) {
      classes.push(classMatch[1]);
      continue;
    }
    const defMatch = statement.text.match(FUNCTION_DEF_REGEX);
    if (defMatch) {
      functions.push(defMatch[1]);
    }
  }

  return { classes, functions };
}
