import { Command } from 'commander';

import { SUPPORTED_PROVIDERS } from './core/providers.js';
import { getPackageInfo } from './utils/package-info.js';
import { collectOption, parsePositiveInt } from './utils/options.js';

const pkg = getPackageInfo();

type GlobalOptions = { config?: string };

export const program = new Command()
  .name('pocketplan')
  .description(pkg.description)
  .version(pkg.version)
  .option('--config <dir>', 'Directory holding .pocketplan.json (defaults to the current directory)')
  .addHelpText(
    'after',
    `
Examples:
  Initialize configuration:  pocketplan init
  Create a plan:             pocketplan plan "add REST endpoint"
  Plan with a local model:   pocketplan plan --provider ollama --model llama3 "set up git"
  Run a playbook:            pocketplan run bootstrap-termux`,
  );

program
  .command('init')
  .description('Create the default configuration file')
  .option('--overwrite', 'Overwrite an existing configuration')
  .action(async (options: { overwrite?: boolean }, command: Command) => {
    const { initCommand } = await import('./commands/init.js');
    const { config } = command.optsWithGlobals<GlobalOptions>();
    await initCommand({ ...options, config });
  });

program
  .command('plan')
  .description('Generate an execution plan from a task description')
  .argument('[description...]', 'Task description')
  .option('--max-steps <n>', 'Limit the number of generated steps', parsePositiveInt)
  .option('--provider <id>', `Planning backend (${SUPPORTED_PROVIDERS.join(', ')})`)
  .option('--model <id>', 'Model identifier for the selected provider')
  .option('--ollama-model <id>', 'Use a local Ollama model (shorthand for --provider ollama --model <id>)')
  .option('--api-base <url>', 'Override the provider endpoint')
  .option('--api-key <key>', 'API key for the provider')
  .option('--api-key-env <name>', 'Environment variable holding the API key')
  .option('-o, --option <key=value>', 'Provider option, repeatable', collectOption, [])
  .option('--stream', 'Stream responses when the provider supports it')
  .option('--chain-of-thought', 'Ask the model to reason step-by-step before returning the plan')
  .option('--json', 'Print the plan as JSON')
  .action(async (description: string[], _options: unknown, command: Command) => {
    const { planCommand } = await import('./commands/plan.js');
    await planCommand(description, command.optsWithGlobals());
  });

program
  .command('run')
  .description('Execute a named playbook from the configuration')
  .argument('<playbook>', 'Playbook name')
  .option('--dry-run', 'Print commands without executing them')
  .option('--parallel', 'Run commands concurrently')
  .option('--max-workers <n>', 'Concurrent commands in parallel mode', parsePositiveInt)
  .action(async (playbook: string, _options: unknown, command: Command) => {
    const { runCommand } = await import('./commands/run.js');
    await runCommand(playbook, command.optsWithGlobals());
  });

program
  .command('show')
  .description('Display the loaded configuration and environment info')
  .option('--playbooks', 'Also list playbooks')
  .action(async (_options: unknown, command: Command) => {
    const { showCommand } = await import('./commands/show.js');
    await showCommand(command.optsWithGlobals());
  });

const playbook = program.command('playbook').description('Manage playbooks in the configuration');

playbook
  .command('add')
  .description('Add or replace a playbook')
  .argument('<name>', 'Playbook name')
  .argument('<commands...>', 'Shell commands, in execution order')
  .action(async (name: string, commands: string[], _options: unknown, command: Command) => {
    const { addPlaybookCommand } = await import('./commands/playbook.js');
    await addPlaybookCommand(name, commands, command.optsWithGlobals<GlobalOptions>());
  });

playbook
  .command('remove')
  .description('Remove a playbook')
  .argument('<name>', 'Playbook name')
  .action(async (name: string, _options: unknown, command: Command) => {
    const { removePlaybookCommand } = await import('./commands/playbook.js');
    await removePlaybookCommand(name, command.optsWithGlobals<GlobalOptions>());
  });
