import { Command } from 'commander';
import {
  DEFAULT_INVENTORY_REPORT,
  DEFAULT_OUTPUT_NAME,
  LANGUAGES,
  OUTPUT_FORMATS,
} from './config/index.js';

export interface MapOptions {
  verbose: boolean;
  output: string;
  outDir?: string;
  format: string;
  language: string;
  excludeDir: string[];
  keepSource: boolean;
  json?: string;
  view: boolean;
}

export interface InventoryOptions {
  verbose: boolean;
  language: string;
  report?: string;
}

export interface CommandHandlers {
  map(root: string | undefined, options: MapOptions): Promise<void>;
  inventory(root: string | undefined, options: InventoryOptions): Promise<void>;
}

/** Accepts `-x a -x b` as well as `-x a,b`. */
export function collectNames(value: string, previous: string[]): string[] {
  const names = value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  return previous.concat(names);
}

export function createProgram(version: string, handlers: CommandHandlers): Command {
  const program = new Command();

  program
    .name('modgraph')
    .description('Map the local import graph of a project and render it with Graphviz')
    .version(version);

  // Default command: map dependencies
  program
    .argument('[root]', 'Project directory to scan (defaults to the tool directory)')
    .option('-v, --verbose', 'Enable verbose logging', false)
    .option('-o, --output <name>', 'Base name of the rendered files', DEFAULT_OUTPUT_NAME)
    .option('-d, --out-dir <dir>', 'Directory for the rendered files (defaults to cwd)')
    .option('-f, --format <format>', `Image format (${OUTPUT_FORMATS.join(', ')})`, 'png')
    .option('-l, --language <language>', `Source language (${LANGUAGES.join(', ')})`, 'typescript')
    .option(
      '-x, --exclude-dir <name>',
      'Directory name to skip, repeatable or comma separated (replaces the defaults)',
      collectNames,
      []
    )
    .option('--keep-source', 'Keep the DOT source next to the image', false)
    .option('--json <file>', 'Also write the graph as JSON')
    .option('--no-view', 'Do not open the rendered image')
    .action((root: string | undefined, options: MapOptions) => handlers.map(root, options));

  // inventory command
  program
    .command('inventory [root]')
    .description('List the classes and functions declared in every source file')
    .option('-v, --verbose', 'Enable verbose logging', false)
    .option('-l, --language <language>', `Source language (${LANGUAGES.join(', ')})`, 'typescript')
    .option('--report <file>', `Report file (defaults to <root>/${DEFAULT_INVENTORY_REPORT})`)
    .action((root: string | undefined, options: InventoryOptions) =>
      handlers.inventory(root, options)
    );

  return program;
}
