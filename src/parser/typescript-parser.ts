import ts from 'typescript';
import { posix } from 'path';
import type { Declarations, ModuleId } from './types.js';
import { ParseError } from '../utils/error-handler.js';
import { getFileExtension } from '../utils/file-utils.js';
import { toModuleId } from '../discovery/module-id.js';

function getScriptKind(filePath: string): ts.ScriptKind {
  switch (getFileExtension(filePath)) {
    case '.tsx':
      return ts.ScriptKind.TSX;
    case '.jsx':
      return ts.ScriptKind.JSX;
    case '.js':
    case '.mjs':
    case '.cjs':
      return ts.ScriptKind.JS;
    default:
      return ts.ScriptKind.TS;
  }
}

function formatDiagnostic(diagnostic: ts.Diagnostic): string {
  const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n');
  if (diagnostic.file && diagnostic.start !== undefined) {
    const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(
      diagnostic.start
    );
    return `(${line + 1},${character + 1}) ${message}`;
  }
  return message;
}

/**
 * Parses without type-checking. Only syntactic diagnostics are reported,
 * so unresolved imports or type errors never reject a file.
 */
export function parseSourceFile(
  filePath: string,
  sourceCode: string
): ts.SourceFile {
  const { diagnostics = [] } = ts.transpileModule(sourceCode, {
    fileName: filePath,
    reportDiagnostics: true,
    compilerOptions: { jsx: ts.JsxEmit.Preserve },
  });
  const errors = diagnostics.filter(
    (d) => d.category === ts.DiagnosticCategory.Error
  );
  if (errors.length > 0) {
    throw new ParseError(
      `Syntax error in ${filePath}: ${formatDiagnostic(errors[0])}`,
      errors.map(formatDiagnostic).join('\n')
    );
  }

  return ts.createSourceFile(
    filePath,
    sourceCode,
    ts.ScriptTarget.Latest,
    true,
    getScriptKind(filePath)
  );
}

function isRequireOrDynamicImport(node: ts.CallExpression): boolean {
  if (node.expression.kind === ts.SyntaxKind.ImportKeyword) {
    return true;
  }
  return ts.isIdentifier(node.expression) && node.expression.text === 'require';
}

export function collectModuleSpecifiers(sourceFile: ts.SourceFile): string[] {
  const specifiers: string[] = [];

  function visit(node: ts.Node) {
    if (ts.isImportDeclaration(node) || ts.isExportDeclaration(node)) {
      const spec = node.moduleSpecifier;
      if (spec && ts.isStringLiteral(spec)) {
        specifiers.push(spec.text);
      }
    } else if (
      ts.isImportEqualsDeclaration(node) &&
      ts.isExternalModuleReference(node.moduleReference) &&
      ts.isStringLiteral(node.moduleReference.expression)
    ) {
      specifiers.push(node.moduleReference.expression.text);
    } else if (ts.isCallExpression(node) && isRequireOrDynamicImport(node)) {
      const [arg] = node.arguments;
      if (arg !== undefined && ts.isStringLiteralLike(arg)) {
        specifiers.push(arg.text);
      }
    } else if (
      ts.isImportTypeNode(node) &&
      ts.isLiteralTypeNode(node.argument) &&
      ts.isStringLiteral(node.argument.literal)
    ) {
      specifiers.push(node.argument.literal.text);
    }

    ts.forEachChild(node, visit);
  }

  visit(sourceFile);
  return specifiers;
}

/**
 * Maps an import specifier to the module identifier it names, or undefined
 * when it cannot name a file under the root.
 *
 * Relative specifiers are resolved against the importing file; bare ones are
 * read as slash-separated paths from the root. No index or extension probing
 * happens: `./utils` names `utils`, never `utils.index`.
 */
export function specifierToModuleId(
  specifier: string,
  fromRelativePath: string,
  extensions: string[]
): ModuleId | undefined {
  if (specifier.startsWith('./') || specifier.startsWith('../')) {
    const resolved = posix.normalize(
      posix.join(posix.dirname(fromRelativePath), specifier)
    );
    if (resolved === '.' || resolved === '..' || resolved.startsWith('../')) {
      return undefined;
    }
    return toModuleId(resolved, extensions);
  }

  // Absolute paths, `node:` builtins and URLs never name a project module.
  if (!specifier || specifier.startsWith('/') || specifier.includes(':')) {
    return undefined;
  }

  return toModuleId(specifier, extensions);
}

export function extractTypeScriptImports(
  sourceCode: string,
  filePath: string,
  relativePath: string,
  knownIds: ReadonlySet<ModuleId>,
  extensions: string[]
): Set<ModuleId> {
  const sourceFile = parseSourceFile(filePath, sourceCode);
  const imports = new Set<ModuleId>();

  for (const specifier of collectModuleSpecifiers(sourceFile)) {
    const id = specifierToModuleId(specifier, relativePath, extensions);
    if (id !== undefined && knownIds.has(id)) {
      imports.add(id);
    }
  }

  return imports;
}

function getMemberName(name: ts.PropertyName): string | undefined {
  if (
    ts.isIdentifier(name) ||
    ts.isPrivateIdentifier(name) ||
    ts.isStringLiteral(name)
  ) {
    return name.text;
  }
  return undefined;
}

export function extractTypeScriptDeclarations(
  sourceCode: string,
  filePath: string
): Declarations {
  const sourceFile = parseSourceFile(filePath, sourceCode);
  const classes: string[] = [];
  const functions: string[] = [];

  function visit(node: ts.Node) {
    if ((ts.isClassDeclaration(node) || ts.isClassExpression(node)) && node.name) {
      classes.push(node.name.text);
    } else if (ts.isFunctionDeclaration(node) && node.name) {
      functions.push(node.name.text);
    } else if (ts.isMethodDeclaration(node)) {
      const name = getMemberName(node.name);
      if (name !== undefined) {
        functions.push(name);
      }
    } else if (
      ts.isVariableDeclaration(node) &&
      ts.isIdentifier(node.name) &&
      node.initializer &&
      (ts.isArrowFunction(node.initializer) ||
        ts.isFunctionExpression(node.initializer))
    ) {
      functions.push(node.name.text);
    }

    ts.forEachChild(node, visit);
  }

  visit(sourceFile);
  return { classes, functions };
}
