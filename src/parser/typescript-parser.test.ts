import { describe, it } from 'mocha';
import { expect } from 'chai';
import {
  extractTypeScriptDeclarations,
  extractTypeScriptImports,
  parseSourceFile,
  specifierToModuleId,
} from './typescript-parser.js';
import { resolveConfig } from '../config/index.js';
import { ParseError } from '../utils/error-handler.js';

const { extensions } = resolveConfig();

describe('specifierToModuleId', () => {
  it('should resolve relative specifiers against the importing file', () => {
    expect(specifierToModuleId('./b.js', 'a.ts', extensions)).to.equal('b');
    expect(specifierToModuleId('../core/log', 'pkg/sub/x.ts', extensions)).to.equal(
      'pkg.core.log'
    );
    expect(specifierToModuleId('./utils', 'main.ts', extensions)).to.equal('utils');
  });

  it('should read bare specifiers as paths from the root', () => {
    expect(specifierToModuleId('commander', 'a.ts', extensions)).to.equal('commander');
    expect(specifierToModuleId('pkg/util', 'a.ts', extensions)).to.equal('pkg.util');
  });

  it('should reject specifiers outside the root', () => {
    expect(specifierToModuleId('../../x', 'a/b.ts', extensions)).to.equal(undefined);
    expect(specifierToModuleId('node:fs', 'a.ts', extensions)).to.equal(undefined);
    expect(specifierToModuleId('/abs/path', 'a.ts', extensions)).to.equal(undefined);
  });
});

describe('TypeScript import extraction', () => {
  it('should collect every static import form', () => {
    const source = [
      "import { a } from './a.js';",
      "import type { B } from './b';",
      "import './side-effect';",
      "export { c } from './c.js';",
      "import d = require('./d');",
      "const e = require('./e');",
      "async function load() { return import('./f.js'); }",
      "type G = import('./g').G;",
      "import chalk from 'chalk';",
      "import { again } from './a';",
    ].join('\n');
    const known = new Set(['a', 'b', 'side-effect', 'c', 'd', 'e', 'f', 'g', 'unused']);

    const imports = extractTypeScriptImports(source, '/p/main.ts', 'main.ts', known, extensions);

    expect([...imports].sort()).to.deep.equal([
      'a',
      'b',
      'c',
      'd',
      'e',
      'f',
      'g',
      'side-effect',
    ]);
  });

  it('should only match exact identifiers', () => {
    const source = "import { x } from './pkg/sub/inner.js';";
    const imports = extractTypeScriptImports(
      source,
      '/p/main.ts',
      'main.ts',
      new Set(['pkg', 'pkg.sub']),
      extensions
    );
    expect(imports.size).to.equal(0);
  });

  it('should resolve imports from nested files', () => {
    const source = "import { log } from '../util/log.js';";
    const imports = extractTypeScriptImports(
      source,
      '/p/core/engine.ts',
      'core/engine.ts',
      new Set(['util.log']),
      extensions
    );
    expect([...imports]).to.deep.equal(['util.log']);
  });

  it('should reject files with syntax errors', () => {
    expect(() => parseSourceFile('/p/broken.ts', "import { a from './a';")).to.throw(
      ParseError
    );
  });

  it('should parse JSX in .tsx files', () => {
    const source = "import { x } from './x';\nexport const el = <div>{x}</div>;";
    const imports = extractTypeScriptImports(
      source,
      '/p/view.tsx',
      'view.tsx',
      new Set(['x']),
      extensions
    );
    expect([...imports]).to.deep.equal(['x']);
  });
});

describe('TypeScript declarations', () => {
  it('should list classes, functions and methods in source order', () => {
    const source = [
      'export class Service {',
      '  start() {}',
      '  private stop() {}',
      '}',
      'function helper() {}',
      'export const handler = () => 1;',
      'const Named = class Inner {};',
    ].join('\n');

    const declarations = extractTypeScriptDeclarations(source, '/p/service.ts');

    expect(declarations).to.deep.equal({
      classes: ['Service', 'Inner'],
      functions: ['start', 'stop', 'helper', 'handler'],
    });
  });
});
