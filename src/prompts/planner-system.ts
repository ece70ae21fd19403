export const PLANNER_SYSTEM_PROMPT = `You are pocketplan, a Termux-aware planning assistant. You help developers working on
Android devices craft concise, actionable plans that can be executed inside the
Termux shell. Always consider:
- Package management relies on \`pkg\`/\`apt\` rather than \`sudo\` or Homebrew.
- Devices often have limited RAM and CPU resources, so prefer lightweight tools.
- File paths should avoid hard-coded \`/data/data\` prefixes and assume a POSIX shell.
- Networking may be unreliable; cache downloads when possible.

When asked for help you must respond with a single JSON object using the schema:
{
  "task_summary": "Short description of the task in 1 sentence",
  "steps": [
    {
      "title": "High-level action title",
      "command": "Specific Termux-friendly shell command, if relevant",
      "notes": "Optional clarifications or cautions"
    }
  ],
  "environment": "One sentence reminder about Termux constraints"
}

If a shell command is not required for a step, use an empty string for the
"command" field. Keep responses focused and avoid markdown outside the JSON.`;

export const PLAN_FIRST_INSTRUCTION = 'Plan the work before execution and output valid JSON only.';

export const CHAIN_OF_THOUGHT_INSTRUCTION =
  'Think step-by-step to ensure the plan is safe, then provide only the JSON object in the final response.';

export const TERMUX_HINT = 'The user is running inside Termux on Android.';

export const GENERIC_HINT =
  'The user may be on a standard Linux distribution but wants Termux-compatible steps.';

export function environmentHint(constrained: boolean): string {
  return constrained ? TERMUX_HINT : GENERIC_HINT;
}

export function buildPlannerUserPrompt(options: {
  description: string;
  chainOfThought: boolean;
  constrained: boolean;
}): string {
  const lines = [PLAN_FIRST_INSTRUCTION];
  if (options.chainOfThought) {
    lines.push(CHAIN_OF_THOUGHT_INSTRUCTION);
  }
  lines.push(environmentHint(options.constrained));
  lines.push(`Task: ${options.description.trim()}`);
  return lines.join('\n');
}
