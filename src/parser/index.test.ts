import { describe, it, afterEach } from 'mocha';
import { expect } from 'chai';
import { join } from 'path';
import { extractAllImports, extractImports } from './index.js';
import { discoverModules } from '../discovery/index.js';
import { resolveConfig } from '../config/index.js';
import { createTree, removeTree } from '../testing/fixtures.js';

describe('Import extraction', () => {
  const config = resolveConfig();
  let root = '';

  afterEach(async () => {
    if (root) await removeTree(root);
    root = '';
  });

  it('should map each module to the known modules it imports', async () => {
    root = await createTree({
      'a.ts': "import { b } from './b.js';\nimport { b as again } from './b';",
      'b.ts': "export * from './c.js';\nimport fs from 'fs';",
      'c.ts': 'export const c = 1;',
    });
    const { modules } = await discoverModules(root, config);

    const result = await extractAllImports(modules, config);

    expect(result.warnings).to.deep.equal([]);
    expect([...result.imports.entries()].map(([id, deps]) => [id, [...deps]])).to.deep.equal([
      ['a', ['b']],
      ['b', ['c']],
      ['c', []],
    ]);
  });

  it('should turn a syntax error into a warning and keep going', async () => {
    root = await createTree({
      'a.ts': "import { b } from './b.js';",
      'b.ts': 'export const = ;',
      'c.ts': "import { a } from './a.js';",
    });
    const { modules } = await discoverModules(root, config);

    const result = await extractAllImports(modules, config);

    expect(result.imports.get('b')?.size).to.equal(0);
    expect([...(result.imports.get('c') ?? [])]).to.deep.equal(['a']);
    expect(result.warnings).to.have.length(1);
    expect(result.warnings[0].moduleId).to.equal('b');
    expect(result.warnings[0].reason).to.equal('syntax');
  });

  it('should report files that are not valid UTF-8', async () => {
    root = await createTree({
      'binary.ts': new Uint8Array([0xff, 0xfe, 0x00, 0x41]),
    });
    const { modules } = await discoverModules(root, config);
    const record = modules.get('binary');
    if (!record) throw new Error('binary module not discovered');

    const result = await extractImports(record, new Set(modules.keys()), config);

    expect(result.imports.size).to.equal(0);
    expect(result.warning?.reason).to.equal('decode');
  });

  it('should report files that vanished after discovery', async () => {
    root = await createTree({});
    const record = {
      id: 'gone',
      filePath: join(root, 'gone.ts'),
      relativePath: 'gone.ts',
    };

    const result = await extractImports(record, new Set(['gone']), config);

    expect(result.imports.size).to.equal(0);
    expect(result.warning?.reason).to.equal('missing');
  });

  it('should dispatch python files to the python scanner', async () => {
    root = await createTree({
      'main.py': 'import core.models\nfrom helpers import tool\n',
      'core/models.py': '',
      'helpers.py': 'import json\n',
    });
    const pythonConfig = resolveConfig({ language: 'python' });
    const { modules } = await discoverModules(root, pythonConfig);

    const result = await extractAllImports(modules, pythonConfig);

    expect([...(result.imports.get('main') ?? [])].sort()).to.deep.equal([
      'core.models',
      'helpers',
    ]);
    expect(result.imports.get('helpers')?.size).to.equal(0);
  });

  it('should report python files with invalid syntax', async () => {
    root = await createTree({
      'a.py': 'import b\nx = = 1\n',
      'b.py': '',
      'c.py': 'import b\nif ready\n    pass\n',
    });
    const pythonConfig = resolveConfig({ language: 'python' });
    const { modules } = await discoverModules(root, pythonConfig);

    const result = await extractAllImports(modules, pythonConfig);

    expect(result.imports.get('a')?.size).to.equal(0);
    expect(result.imports.get('c')?.size).to.equal(0);
    expect(result.warnings.map((w) => [w.moduleId, w.reason])).to.deep.equal([
      ['a', 'syntax'],
      ['c', 'syntax'],
    ]);
  });
});
