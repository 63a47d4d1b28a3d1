/**
 * Templates commands - document template management
 */

import { Command } from 'commander';
import { ConfigManager } from '../config/index.js';
import { TemplatesStore } from '../templates/index.js';
import { readTextFile } from '../utils/fs.js';
import { getOutputOptions, output, outputError, outputSuccess, outputTable } from '../utils/output.js';

/**
 * Maximum input size for template YAML (1MB)
 */
const MAX_STDIN_SIZE = 1024 * 1024;

/**
 * Read from stdin with size limit
 */
async function readStdin(maxBytes = MAX_STDIN_SIZE): Promise<string> {
  const chunks: Buffer[] = [];
  let totalSize = 0;
  for await (const chunk of process.stdin) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    totalSize += buf.length;
    if (totalSize > maxBytes) {
      throw new Error(`Input exceeds maximum size of ${maxBytes} bytes`);
    }
    chunks.push(buf);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function openStore(getConfigPath: () => string): TemplatesStore {
  return new TemplatesStore(new ConfigManager(getConfigPath()).getConfigDir());
}

export function createTemplatesCommand(getConfigPath: () => string): Command {
  const cmd = new Command('templates')
    .description('Manage document templates');

  const listAction = async () => {
    try {
      const templates = await openStore(getConfigPath).listTemplates();

      if (getOutputOptions().json) {
        output(templates.map(t => ({
          name: t.name,
          source: t.source,
          description: t.description,
          digest_sha256: t.digest_sha256,
        })));
        return;
      }

      const rows = templates.map(t => [t.name, t.source, t.digest_sha256, t.description ?? '']);
      outputTable(['Name', 'Source', { header: 'Digest', maxWidth: 13 }, { header: 'Description', maxWidth: 50 }], rows);
    } catch (error) {
      outputError('Failed to list templates', error);
      process.exit(1);
    }
  };

  cmd
    .command('ls')
    .description('List built-in and user templates')
    .action(listAction);

  cmd
    .command('list')
    .description('Alias for ls')
    .action(listAction);

  cmd
    .command('show')
    .description('Show template details')
    .argument('<name>', 'Template name')
    .option('--raw', 'Show raw YAML content')
    .action(async (name: string, options: { raw?: boolean }) => {
      try {
        const template = await openStore(getConfigPath).getTemplate(name);

        if (!template) {
          outputError(`Template not found: ${name}`);
          process.exit(1);
        }

        if (options.raw) {
          console.log(template.content_yaml);
          return;
        }

        if (getOutputOptions().json) {
          output(template);
          return;
        }

        console.log(`Name: ${template.name}`);
        console.log(`Digest: ${template.digest_sha256}`);
        console.log(`Source: ${template.source}`);
        if (template.description) {
          console.log(`Description: ${template.description}`);
        }
        console.log('');
        console.log('--- YAML ---');
        console.log(template.content_yaml);
      } catch (error) {
        outputError('Failed to show template', error);
        process.exit(1);
      }
    });

  cmd
    .command('add')
    .description('Add a user template')
    .argument('<name>', 'Template name (lowercase, numbers, hyphens, underscores only)')
    .option('--file <path>', 'Read template YAML from file')
    .option('--stdin', 'Read template YAML from stdin')
    .option('-f, --force', 'Replace an existing user template')
    .action(async (name: string, options: { file?: string; stdin?: boolean; force?: boolean }) => {
      try {
        let yamlContent: string;
        if (options.stdin) {
          yamlContent = await readStdin();
        } else if (options.file) {
          yamlContent = await readTextFile(options.file);
        } else {
          outputError('Either --file or --stdin is required');
          process.exit(1);
        }

        const store = openStore(getConfigPath);
        const result = await store.addTemplate(name, yamlContent, { force: options.force });
        if (!result.success) {
          outputError(result.error);
          process.exit(1);
        }

        outputSuccess(`Template '${name}' added`, {
          name,
          digest_sha256: result.template.digest_sha256,
          path: store.getTemplatesDir(),
        });
      } catch (error) {
        outputError('Failed to add template', error);
        process.exit(1);
      }
    });

  cmd
    .command('remove')
    .alias('rm')
    .description('Delete a user template')
    .argument('<name>', 'Template name')
    .action(async (name: string) => {
      try {
        const result = await openStore(getConfigPath).removeTemplate(name);
        if (!result.success) {
          outputError(result.error ?? `Failed to remove template '${name}'`);
          process.exit(1);
        }
        outputSuccess(`Template '${name}' removed`);
      } catch (error) {
        outputError('Failed to remove template', error);
        process.exit(1);
      }
    });

  return cmd;
}
