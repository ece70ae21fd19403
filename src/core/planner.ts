import { z } from 'zod';

import { environmentNote, isConstrainedEnvironment } from './environment.js';
import { createStep, truncated, type Plan, type PlanStep } from './plan.js';
import { requestPlanText, type ProviderOptions, type ProviderOverrides } from './providers.js';

export interface GeneratePlanOptions {
  maxSteps?: number;
  provider?: string;
  model?: string;
  /** Older alias for `model`; selects the ollama provider when `provider` is unset. */
  ollamaModel?: string;
  stream?: boolean;
  chainOfThought?: boolean;
  providerOptions?: ProviderOptions;
  /** Overrides Termux detection. */
  constrained?: boolean;
  overrides?: ProviderOverrides;
}

/**
 * Turn a task description into a Plan.
 *
 * Without a provider the steps come from sentence-splitting the description. With one, the
 * model's reply is read as a JSON plan first, then as a plain list, and the sentence split is
 * the last resort. Provider failures propagate; unusable reply text does not.
 */
export async function generatePlan(
  description: string,
  options: GeneratePlanOptions = {},
): Promise<Plan> {
  const normalized = description.replace(/\r?\n|\r/g, ' ').trim();
  const constrained = options.constrained ?? isConstrainedEnvironment();
  const defaultNote = environmentNote(constrained);

  if (!normalized) {
    return { summary: '', steps: [], environmentNote: defaultNote };
  }

  const summary = deriveSummary(normalized);
  const provider = options.provider?.trim() || (options.ollamaModel ? 'ollama' : 'heuristic');

  let plan: Plan;
  if (provider.toLowerCase() !== 'heuristic') {
    const raw = await requestPlanText(
      {
        provider,
        description: normalized,
        model: options.model || options.ollamaModel,
        constrained,
        chainOfThought: options.chainOfThought ?? false,
        stream: options.stream ?? false,
        options: options.providerOptions ?? {},
      },
      options.overrides,
    );

    const parsed = parsePlanJson(raw);
    if (parsed) {
      plan = {
        summary: parsed.summary || summary,
        steps: parsed.steps,
        environmentNote: parsed.environmentNote || defaultNote,
      };
    } else {
      const listed = parseListing(raw);
      plan = {
        summary,
        steps: listed.length > 0 ? listed : heuristicSteps(normalized),
        environmentNote: defaultNote,
      };
    }
  } else {
    plan = { summary, steps: heuristicSteps(normalized), environmentNote: defaultNote };
  }

  if (options.maxSteps !== undefined && options.maxSteps < plan.steps.length) {
    plan = truncated(plan, options.maxSteps);
  }

  if (!plan.environmentNote) {
    plan = { ...plan, environmentNote: defaultNote };
  }

  return plan;
}

// ── Text helpers ───────────────────────────────────────────────────────

export function capitalize(text: string): string {
  const trimmed = text.trim();
  if (!trimmed) return '';
  return trimmed[0].toUpperCase() + trimmed.slice(1);
}

export function deriveSummary(description: string): string {
  for (const part of description.split(/[.!?]/)) {
    const cleaned = part.trim();
    if (cleaned) return capitalize(cleaned);
  }
  return capitalize(description.slice(0, 120));
}

export function normalizeEnvironmentText(value: unknown): string {
  if (typeof value !== 'string') return '';
  const candidate = value.trim();
  if (!candidate) return '';
  return candidate.toLowerCase().startsWith('environment:')
    ? candidate
    : `Environment: ${candidate}`;
}

function cleanText(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  return value.trim() || undefined;
}

function firstText(record: Record<string, unknown>, keys: string[]): string | undefined {
  for (const key of keys) {
    const text = cleanText(record[key]);
    if (text) return text;
  }
  return undefined;
}

// ── Heuristic ──────────────────────────────────────────────────────────

export function heuristicSteps(description: string): PlanStep[] {
  return description
    .replace(/[?!]/g, '.')
    .split('.')
    .map((sentence) => sentence.trim())
    .filter(Boolean)
    .map((sentence) => createStep(capitalize(sentence)));
}

// ── Loose listing ──────────────────────────────────────────────────────

const LISTING_PREFIX = /^(?:[-*•]\s*|\d+[).:-]\s*|step\s+\d+[:.-]\s*)/i;

export function parseListing(raw: string): PlanStep[] {
  const steps: PlanStep[] = [];
  for (const line of raw.split(/\r\n|\r|\n/)) {
    const stripped = line.trim().replace(LISTING_PREFIX, '').trim();
    if (stripped) {
      steps.push(createStep(capitalize(stripped)));
    }
  }
  return steps;
}

// ── Strict JSON ────────────────────────────────────────────────────────

const recordSchema = z.record(z.unknown());
// only a fence wrapping the whole reply; a snippet inside a list stays list text
const FENCED_BLOCK = /^\s*```(?:json)?\s*\n([\s\S]*?)\n?\s*```\s*$/i;

function parseJsonObject(raw: string): Record<string, unknown> | null {
  const candidates = [raw];
  const fenced = raw.match(FENCED_BLOCK);
  if (fenced) candidates.push(fenced[1]);

  for (const candidate of candidates) {
    let payload: unknown;
    try {
      payload = JSON.parse(candidate);
    } catch {
      continue;
    }
    const parsed = recordSchema.safeParse(payload);
    return parsed.success ? parsed.data : null;
  }
  return null;
}

export function parseStepEntry(entry: unknown): PlanStep | null {
  if (typeof entry === 'string') {
    const title = cleanText(entry);
    return title ? createStep(capitalize(title)) : null;
  }

  const record = recordSchema.safeParse(entry);
  if (!record.success) return null;

  const command = cleanText(record.data.command);
  const notes = firstText(record.data, ['notes', 'note', 'details']);
  const title = firstText(record.data, ['title', 'summary', 'action']) ?? command;
  if (!title) return null;

  return createStep(capitalize(title), command, notes);
}

/**
 * Read a model reply as a JSON plan. Returns null when the text is not a JSON object or
 * carries no steps, summary or environment. Summary and environment come back empty when
 * the reply leaves them out.
 */
export function parsePlanJson(raw: string): Plan | null {
  const payload = parseJsonObject(raw);
  if (!payload) return null;

  const summary = cleanText(payload.task_summary) ?? cleanText(payload.summary) ?? '';
  const environment = normalizeEnvironmentText(payload.environment);

  const steps: PlanStep[] = [];
  if (Array.isArray(payload.steps)) {
    for (const entry of payload.steps) {
      const step = parseStepEntry(entry);
      if (step) steps.push(step);
    }
  }

  if (steps.length === 0 && !summary && !environment) {
    return null;
  }

  return { summary, steps, environmentNote: environment };
}
