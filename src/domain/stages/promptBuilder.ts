export interface PromptSections {
  role: string;
  scenario: string;
  context?: readonly string[];
  instructions: readonly string[];
  responseShape: string;
}

export function truncate(text: string, maxLength: number): string {
  const trimmed = text.trim();
  return trimmed.length <= maxLength ? trimmed : `${trimmed.slice(0, maxLength)}...`;
}

export function bulletList(entries: readonly string[], limit: number, maxLength = 200): string {
  const shown = entries.slice(0, limit).map(entry => `- ${truncate(entry, maxLength)}`);
  return shown.length > 0 ? shown.join('\n') : '- (none)';
}

/**
 * Assembles a stage prompt. Upstream context blocks are expected to be
 * bounded summaries, never full stage outputs.
 */
export function renderPrompt(sections: PromptSections): string {
  const parts = [
    sections.role,
    `SCENARIO:\n${sections.scenario.trim()}`,
  ];
  if (sections.context && sections.context.length > 0) {
    parts.push(`CONTEXT FROM EARLIER ANALYSIS:\n${sections.context.join('\n\n')}`);
  }
  parts.push(`TASK:\n${sections.instructions.map(line => `- ${line}`).join('\n')}`);
  parts.push(
    'Respond with a single JSON object and nothing else, following this shape:\n' +
      sections.responseShape.trim()
  );
  return parts.join('\n\n');
}
