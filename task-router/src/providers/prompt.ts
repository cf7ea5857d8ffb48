import type { TaskPacket } from '../tasks/packet.js';

function section(title: string, items: readonly string[]): string[] {
  if (items.length === 0) return [];
  return ['', `## ${title}`, ...items.map((item) => `- ${item}`)];
}

/**
 * Render a task packet as the prompt text shared by all adapters
 */
export function buildPrompt(task: TaskPacket): string {
  const lines: string[] = [`# Task: ${task.goal.title}`];

  if (task.goal.description) {
    lines.push('', task.goal.description);
  }

  lines.push(
    ...section('Success Criteria', task.goal.successCriteria),
    ...section('File Scope', task.constraints.fileScope),
    ...section('Style Rules', task.constraints.styleRules),
    ...section('Forbidden', task.constraints.forbidden),
    ...section('Context Files', task.inputs.contextFiles),
    ...section('Previous Attempt Feedback', task.inputs.retryGuidance)
  );

  return lines.join('\n');
}
