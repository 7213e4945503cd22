import type { ResponseContract } from '../contracts/contract';
import type { ContractRegistry } from '../contracts/registry';
import { Logger, createLogger } from '../utils/logger';
import type { PromptTemplate, PromptTemplateStore } from './templateStore';

export type PromptVariables = Record<string, string>;

export const JSON_INSTRUCTION =
  'IMPORTANT: Your response MUST be a valid JSON object with the exact structure shown in the following JSON schema:';
export const EXAMPLE_INTRO = "Here's an example of a valid response:";

const PLACEHOLDER = /\{\{\s*([\w.-]+)\s*\}\}/g;

export function substitute(text: string, variables: PromptVariables): string {
  return text.replace(PLACEHOLDER, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(variables, key) ? variables[key] : match
  );
}

export class PromptBuilder {
  private readonly logger: Logger;

  constructor(
    private readonly templates: PromptTemplateStore,
    private readonly contracts: ContractRegistry,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('prompt-builder');
  }

  /**
   * Renders the named template followed by the JSON schema and an example response
   * for the contract. Returns null when no such template is loaded.
   */
  build<T>(
    templateName: string,
    contract: ResponseContract<T>,
    variables: PromptVariables = {}
  ): string | null {
    const template = this.lookup(templateName);
    if (!template) return null;

    const schema = this.contracts.generateSchema(contract);
    const example = this.contracts.generateExample(contract);

    return [
      ...this.body(template, variables),
      JSON_INSTRUCTION,
      '```json',
      schema,
      '```',
      '',
      EXAMPLE_INTRO,
      '```json',
      example,
      '```',
      '',
    ].join('\n');
  }

  buildText(templateName: string, variables: PromptVariables = {}): string | null {
    const template = this.lookup(templateName);
    if (!template) return null;
    return this.body(template, variables).join('\n');
  }

  private lookup(templateName: string): PromptTemplate | undefined {
    const template = this.templates.get(templateName);
    if (!template) {
      this.logger.warn(`Prompt template not found: ${templateName}`);
    }
    return template;
  }

  private body(template: PromptTemplate, variables: PromptVariables): string[] {
    const lines: string[] = [];
    const { role, task, instructions } = template.template;
    if (role) lines.push(substitute(role, variables), '');
    if (task) lines.push(substitute(task, variables), '');
    if (instructions.length > 0) {
      for (const instruction of instructions) {
        lines.push(substitute(instruction, variables));
      }
      lines.push('');
    }
    return lines;
  }
}
