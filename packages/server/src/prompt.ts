import type { GetPromptResult, Prompt } from '@duplexmcp/protocol';

import type { InvocationContext } from '#types/handler';

/** renders a prompt from its string arguments */
export type PromptRenderer = (
  args: Record<string, string>,
  context: InvocationContext,
) => Promise<GetPromptResult>;

/** a registered prompt with the renderer producing its messages */
export type ServerPrompt = Prompt & {
  render: PromptRenderer;
};

/**
 * strips the renderer off a registered prompt
 * @param prompt registered prompt
 * @returns the definition announced by prompts/list
 */
export function describePrompt(prompt: ServerPrompt): Prompt {
  const { render, ...definition } = prompt;

  return definition;
}

/**
 * lists the required arguments a prompt request leaves out
 * @param prompt registered prompt
 * @param args arguments sent by the client
 * @returns names of the missing arguments, in declaration order
 */
export function findMissingArguments(
  prompt: Prompt,
  args: Record<string, string>,
): string[] {
  return (prompt.arguments ?? [])
    .filter((argument) => argument.required && args[argument.name] === undefined)
    .map((argument) => argument.name);
}
