import chalk from 'chalk';

import { loadConfig, type LlmConfig } from '../core/config.js';
import { formatPlanLines, isPlanEmpty, planToJSON } from '../core/plan.js';
import { generatePlan } from '../core/planner.js';
import { KNOWN_PROVIDER_OPTIONS, type ProviderOverrides } from '../core/providers.js';
import { logger } from '../ui/logger.js';
import { inputPrompt, isInteractive } from '../ui/prompts.js';
import { withSpinner } from '../ui/spinner.js';
import { parseOptionPairs } from '../utils/options.js';

export interface PlanCommandOptions {
  config?: string;
  maxSteps?: number;
  provider?: string;
  model?: string;
  ollamaModel?: string;
  apiBase?: string;
  apiKey?: string;
  apiKeyEnv?: string;
  option?: string[];
  stream?: boolean;
  chainOfThought?: boolean;
  json?: boolean;
}

export interface PlanSettings {
  provider?: string;
  model?: string;
  ollamaModel?: string;
  providerOptions: Record<string, string>;
}

/** Merge CLI flags over the `llm` block of the config file. */
export function resolvePlanSettings(
  options: PlanCommandOptions,
  llm?: LlmConfig,
): PlanSettings {
  const providerOptions: Record<string, string> = { ...llm?.options };
  if (llm?.api_base) providerOptions.api_base = llm.api_base;
  if (llm?.api_key_env) providerOptions.api_key_env = llm.api_key_env;

  Object.assign(providerOptions, parseOptionPairs(options.option ?? []));

  if (options.apiBase) providerOptions.api_base = options.apiBase;
  if (options.apiKey) providerOptions.api_key = options.apiKey;
  if (options.apiKeyEnv) providerOptions.api_key_env = options.apiKeyEnv;

  // --ollama-model alone means "use ollama", whatever provider the config names
  const provider = options.provider ?? (options.ollamaModel ? undefined : llm?.provider);
  const model = options.model ?? (options.ollamaModel ? undefined : (llm?.model ?? undefined));

  return {
    provider,
    model,
    ollamaModel: options.ollamaModel,
    providerOptions,
  };
}

export interface PlanCommandContext {
  overrides?: ProviderOverrides;
  constrained?: boolean;
}

export async function planCommand(
  descriptionParts: string[],
  options: PlanCommandOptions,
  context: PlanCommandContext = {},
): Promise<void> {
  let description = descriptionParts.join(' ');
  if (!description.trim() && !options.json && isInteractive()) {
    description = await inputPrompt('Describe your task:');
  }

  const config = await loadConfig(options.config ?? process.cwd());
  const settings = resolvePlanSettings(options, config?.llm);
  const provider =
    settings.provider?.trim().toLowerCase() || (settings.ollamaModel ? 'ollama' : 'heuristic');
  const remote = provider !== 'heuristic';
  logger.debug(`Planning with provider: ${provider}`);

  // stdout carries only the plan in JSON mode
  if (!options.json) {
    for (const key of Object.keys(settings.providerOptions)) {
      if (!KNOWN_PROVIDER_OPTIONS.has(key)) {
        logger.warn(`Ignoring unknown provider option '${key}'.`);
      }
    }
  }

  const plan = await withSpinner(
    'Requesting plan...',
    () =>
      generatePlan(description, {
        maxSteps: options.maxSteps,
        provider: settings.provider,
        model: settings.model,
        ollamaModel: settings.ollamaModel,
        stream: options.stream,
        chainOfThought: options.chainOfThought,
        providerOptions: settings.providerOptions,
        constrained: context.constrained,
        overrides: context.overrides,
      }),
    { enabled: remote && !options.json && isInteractive() },
  );

  if (isPlanEmpty(plan)) {
    logger.error('No plan generated. Provide a description.');
    process.exitCode = 1;
    return;
  }

  if (options.json) {
    console.log(JSON.stringify(planToJSON(plan), null, 2));
    return;
  }

  logger.header('Generated plan:');
  if (plan.summary) {
    logger.field('Summary', plan.summary);
    console.log();
  }
  for (const line of formatPlanLines(plan)) {
    console.log(line.startsWith('Environment:') ? chalk.dim(line) : line);
  }
}
