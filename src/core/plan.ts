export interface PlanStep {
  readonly title: string;
  readonly command?: string;
  readonly notes?: string;
}

export interface Plan {
  readonly summary: string;
  readonly steps: readonly PlanStep[];
  /** Always a single line starting with `Environment:`. */
  readonly environmentNote: string;
}

/** Structured output shape written by `plan --json`. */
export interface PlanJSON {
  summary: string;
  steps: { title: string; command?: string; notes?: string }[];
  environment: string;
}

export function createStep(title: string, command?: string, notes?: string): PlanStep {
  const step: { title: string; command?: string; notes?: string } = { title };
  if (command) step.command = command;
  if (notes) step.notes = notes;
  return step;
}

/** Copy of `plan` limited to `maxSteps` entries. */
export function truncated(plan: Plan, maxSteps?: number): Plan {
  if (maxSteps === undefined || maxSteps >= plan.steps.length) {
    return { ...plan, steps: [...plan.steps] };
  }
  return { ...plan, steps: plan.steps.slice(0, Math.max(0, maxSteps)) };
}

export function isPlanEmpty(plan: Plan): boolean {
  return plan.steps.length === 0 && plan.summary.trim() === '';
}

export function planToJSON(plan: Plan): PlanJSON {
  return {
    summary: plan.summary,
    steps: plan.steps.map((step) => {
      const data: PlanJSON['steps'][number] = { title: step.title };
      if (step.command) data.command = step.command;
      if (step.notes) data.notes = step.notes;
      return data;
    }),
    environment: plan.environmentNote,
  };
}

export function formatStepLines(step: PlanStep, index: number): string[] {
  const lines = [` - Step ${index}: ${step.title}`];
  if (step.command) lines.push(`   Command: ${step.command}`);
  if (step.notes) lines.push(`   Notes: ${step.notes}`);
  return lines;
}

export function formatPlanLines(plan: Plan): string[] {
  const lines = plan.steps.flatMap((step, i) => formatStepLines(step, i + 1));
  if (plan.environmentNote) {
    if (lines.length > 0) lines.push('');
    lines.push(plan.environmentNote);
  }
  return lines;
}
