#!/usr/bin/env node
import { Command, Option } from 'commander';
import { migrate } from './commands/migrate.js';
import { validate } from './commands/validate.js';

const program = new Command();

program
  .name('argocd-app-migrator')
  .description('Migrate ArgoCD Application manifests to ApplicationSet Git generator JSON')
  .version('0.1.0');

// Default command: migrate
program
  .command('migrate', { isDefault: true })
  .description('Convert a directory of Application YAML files into generator JSON')
  .option('-i, --input-dir <path>', 'Directory containing ArgoCD Application YAML files')
  .option('-o, --output-dir <path>', 'Output directory (default: current directory)')
  .option('-r, --recursive', 'Scan subdirectories recursively')
  .option('--dry-run', 'Print the generated JSON without writing files')
  .option('-c, --config <path>', 'Path to a YAML config file')
  .addOption(
    new Option('--format <type>', 'Output layout').choices(['aggregate', 'per-application']),
  )
  .option('--output-file <name>', 'File name for aggregate output (default: applicationset.json)')
  .option('--directory-recurse', 'Default source.directory.recurse to true (default)')
  .option('--no-directory-recurse', 'Default source.directory.recurse to false')
  .option('--schema <path>', 'JSON Schema to validate against instead of the bundled one')
  .option('--save-config <path>', 'Save the resolved configuration as a YAML file')
  .action(migrate);

program
  .command('validate')
  .description('Validate an existing generator JSON file against the schema')
  .option('-f, --file <path>', 'JSON file to validate', 'applicationset.json')
  .option('--schema <path>', 'JSON Schema to validate against instead of the bundled one')
  .action(validate);

await program.parseAsync();
