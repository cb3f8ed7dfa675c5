import type { ChatCompletionMessageParam } from "openai/resources";
import type { ToolGeneratorPort } from "../../ports/tools/ToolGeneratorPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { OPENAI_MODEL } from "../../env";
import { getOpenAI } from "../../openai";

const SYSTEM_PROMPT = `You write small, self-contained TypeScript tools.
Respond with only the full TypeScript module in a single \`\`\`ts code block.
The module must export exactly one top-level function with the requested name.
Give every parameter a type annotation and document the function with a JSDoc block.
Parameters may have literal default values. Do not include tests or example calls.
Import npm packages with ES import syntax; they are installed separately.
Read keys and secrets from process.env, never hard-code them.`;

export function buildToolPrompt(name: string, description: string): ChatCompletionMessageParam[] {
  return [
    { role: "system", content: SYSTEM_PROMPT },
    {
      role: "user",
      content: `Function name: ${name}\nDescription: ${description}`,
    },
  ];
}

/** Takes the first fenced code block, or the whole reply when there is none. */
export function extractCode(reply: string): string {
  const fenced = /```[a-zA-Z]*\s*\n([\s\S]*?)```/.exec(reply);
  const code = (fenced ? fenced[1] : reply).trim();
  return `${code}\n`;
}

export interface OpenAiToolGeneratorOptions {
  model?: string;
  logger?: LoggerPort;
}

export class OpenAiToolGenerator implements ToolGeneratorPort {
  private readonly model: string;

  constructor(private readonly options: OpenAiToolGeneratorOptions = {}) {
    this.model = options.model ?? OPENAI_MODEL;
  }

  async generate(name: string, description: string): Promise<string> {
    const client = getOpenAI();
    this.options.logger?.debug("Requesting tool source", { name, model: this.model });

    const resp = await client.chat.completions.create({
      model: this.model,
      messages: buildToolPrompt(name, description),
    });

    const content = resp.choices?.[0]?.message?.content;
    if (typeof content !== "string" || !content.trim()) {
      throw new Error(`LLM returned no source for tool "${name}".`);
    }
    return extractCode(content);
  }
}
