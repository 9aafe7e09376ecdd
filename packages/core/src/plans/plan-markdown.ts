import { formatGoalLabel } from "../catalog/themes.ts";
import type { ActivityPlan } from "./activity-plan.ts";

export function renderActivityPlanMarkdown(plan: ActivityPlan): string {
  const lines: string[] = [`# ${plan.title}`, "", plan.summary, "", "## Plan"];
  plan.steps.forEach((step, index) => lines.push(`${index + 1}. ${step}`));

  lines.push("", "## Sicherheit");
  plan.safety_notes.forEach((note) => lines.push(`- ${note}`));

  lines.push("", "## Eltern-Kind-Impulse");
  plan.parent_child_prompts.forEach((prompt) => lines.push(`- Sag: ${prompt.say} / Tu: ${prompt.do}`));

  lines.push("", "## Varianten");
  plan.variants.forEach((variant) => lines.push(`- ${variant}`));

  if (plan.supports.length > 0) {
    lines.push("", "## Fördert");
    plan.supports.forEach((goal) => lines.push(`- ${formatGoalLabel(goal)}`));
  }

  return `${lines.join("\n")}\n`;
}
