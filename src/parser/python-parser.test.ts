import { describe, it } from 'mocha';
import { expect } from 'chai';
import {
  extractPythonDeclarations,
  extractPythonImports,
  expandStatement,
  parseImportStatement,
  readStatements,
  splitStatements,
} from './python-parser.js';
import { ParseError } from '../utils/error-handler.js';

const FILE = '/p/module.py';

describe('Python statement splitting', () => {
  it('should drop comments, collapse strings and split on semicolons', () => {
    const source = [
      '"""Module docstring',
      'import fake',
      '"""',
      'import os, core.models as m  # comment',
      "name = 'import x'",
      'x = 1; import pkg.sub',
    ].join('\n');

    expect(splitStatements(source, FILE)).to.deep.equal([
      { text: '""', line: 1 },
      { text: 'import os, core.models as m', line: 4 },
      { text: 'name = ""', line: 5 },
      { text: 'x = 1', line: 6 },
      { text: 'import pkg.sub', line: 6 },
    ]);
  });

  it('should join bracketed and backslash-continued lines', () => {
    const source = 'from a import (b,\n    c)\nimport d, \\\n  e';

    const statements = splitStatements(source, FILE);

    expect(statements.map((s) => s.line)).to.deep.equal([1, 3]);
    expect(parseImportStatement(statements[0], FILE)).to.deep.equal(['a']);
    expect(parseImportStatement(statements[1], FILE)).to.deep.equal(['d', 'e']);
  });

  it('should reject unterminated strings and brackets', () => {
    expect(() => splitStatements('x = """never closed\n', FILE)).to.throw(ParseError);
    expect(() => splitStatements("x = 'open\n", FILE)).to.throw(ParseError);
    expect(() => splitStatements('from a import (b,\n', FILE)).to.throw(ParseError);
    expect(() => splitStatements('x = 1)\n', FILE)).to.throw(ParseError);
  });
});

describe('Python block headers', () => {
  it('should treat the text after a header colon as its own statement', () => {
    const statements = readStatements(
      'if TYPE_CHECKING: import b\ntry: import c\nexcept ImportError: pass\n',
      FILE
    );

    expect(statements).to.deep.equal([
      { text: 'if TYPE_CHECKING', line: 1 },
      { text: 'import b', line: 1 },
      { text: 'try', line: 2 },
      { text: 'import c', line: 2 },
      { text: 'except ImportError', line: 3 },
      { text: 'pass', line: 3 },
    ]);
  });

  it('should ignore colons inside brackets and walrus operators', () => {
    expect(
      expandStatement({ text: 'def f(a: int, b=x[1:2]) -> dict[str, int]:', line: 4 }, FILE)
    ).to.deep.equal([{ text: 'def f(a: int, b=x[1:2]) -> dict[str, int]', line: 4 }]);
    expect(expandStatement({ text: 'while n := step(): import d', line: 5 }, FILE)).to.deep.equal(
      [
        { text: 'while n := step()', line: 5 },
        { text: 'import d', line: 5 },
      ]
    );
  });

  it('should leave names that merely start with a keyword alone', () => {
    expect(expandStatement({ text: 'if_ready = True', line: 1 }, FILE)).to.deep.equal([
      { text: 'if_ready = True', line: 1 },
    ]);
  });

  it('should reject malformed headers and assignments', () => {
    expect(() => readStatements('import b\nif x\n    pass\n', FILE)).to.throw(
      ParseError,
      "expected ':' after 'if'"
    );
    expect(() => readStatements('import b\nx = = 1\n', FILE)).to.throw(
      ParseError,
      'invalid assignment'
    );
    expect(() => readStatements('total =\n', FILE)).to.throw(
      ParseError,
      'missing assignment value'
    );
    expect(() => readStatements('else x:\n    pass\n', FILE)).to.throw(
      ParseError,
      "unexpected text after 'else'"
    );
  });
});

describe('Python import statements', () => {
  it('should return every dotted name of a plain import', () => {
    expect(parseImportStatement({ text: 'import a.b as c, d', line: 1 }, FILE)).to.deep.equal([
      'a.b',
      'd',
    ]);
  });

  it('should return the from-module of a from-import', () => {
    expect(parseImportStatement({ text: 'from x.y import z', line: 1 }, FILE)).to.deep.equal([
      'x.y',
    ]);
    expect(parseImportStatement({ text: 'from .utils import *', line: 1 }, FILE)).to.deep.equal([
      'utils',
    ]);
    expect(parseImportStatement({ text: 'from . import sibling', line: 1 }, FILE)).to.deep.equal(
      []
    );
  });

  it('should ignore statements that are not imports', () => {
    expect(parseImportStatement({ text: 'import_data = 3', line: 1 }, FILE)).to.deep.equal([]);
    expect(parseImportStatement({ text: 'print("x")', line: 1 }, FILE)).to.deep.equal([]);
  });

  it('should reject malformed imports', () => {
    expect(() => parseImportStatement({ text: 'import', line: 1 }, FILE)).to.throw(ParseError);
    expect(() => parseImportStatement({ text: 'from x import', line: 1 }, FILE)).to.throw(
      ParseError
    );
    expect(() => parseImportStatement({ text: 'import a-b', line: 1 }, FILE)).to.throw(
      ParseError
    );
  });
});

describe('Python extraction', () => {
  it('should keep only known module identifiers', () => {
    const source = [
      '"""import fake"""',
      'import os',
      'import core.models as models',
      'from .utils import helper',
      'def run():',
      '    import pkg.sub',
    ].join('\n');
    const known = new Set(['core.models', 'utils', 'pkg.sub', 'fake']);

    const imports = extractPythonImports(source, FILE, known);

    expect([...imports].sort()).to.deep.equal(['core.models', 'pkg.sub', 'utils']);
  });

  it('should find imports in one-line block bodies', () => {
    const source = 'if True: import b\ntry: import c\nexcept ImportError: pass\n';

    const imports = extractPythonImports(source, FILE, new Set(['a', 'b', 'c']));

    expect([...imports].sort()).to.deep.equal(['b', 'c']);
  });

  it('should list classes and functions', () => {
    const source = [
      'class Portfolio:',
      '    def __init__(self):',
      '        pass',
      '',
      '    async def refresh(self):',
      '        pass',
      '',
      'def main():',
      '    pass',
    ].join('\n');

    expect(extractPythonDeclarations(source, FILE)).to.deep.equal({
      classes: ['Portfolio'],
      functions: ['__init__', 'refresh', 'main'],
    });
  });
});
