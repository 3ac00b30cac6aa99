import { Ajv } from 'ajv';

import type {
  ContentBlock,
  JsonifibleValue,
  JsonSchema,
  ToolAnnotations,
  Tool as ToolSpec,
} from '@duplexmcp/protocol';
import type { ValidateFunction } from 'ajv';

import type { InvocationContext } from '#types/handler';

/** executes a tool with arguments that passed its input schema */
export type ToolHandler = (
  args: Record<string, JsonifibleValue>,
  context: InvocationContext,
) => Promise<ContentBlock[]>;

/** executable tool whose arguments are checked against its input schema */
export class ServerTool implements ToolSpec {
  /** unique identifier for the tool */
  #name: string;
  /** human-readable display name for UI contexts */
  #title?: string;
  /** human-readable explanation of what this tool does */
  #description: string;
  /** JSON Schema defining the structure of arguments this tool accepts */
  #inputSchema: JsonSchema;
  /** optional metadata or annotations */
  #annotations?: ToolAnnotations;
  /** function that executes the tool's logic */
  #handler: ToolHandler;

  #verifyInput: ValidateFunction;

  /**
   * creates a new tool instance
   * @param params tool definition and its handler
   */
  constructor(params: ToolSpec & { handler: ToolHandler }) {
    this.#name = params.name;
    this.#title = params.title;
    this.#description = params.description;
    this.#inputSchema = params.inputSchema;
    this.#annotations = params.annotations;
    this.#handler = params.handler;

    this.#verifyInput = new Ajv({ allErrors: true, strict: false }).compile(
      params.inputSchema,
    );
  }

  /** unique identifier for the tool */
  public get name(): string {
    return this.#name;
  }

  /** human-readable display name for UI contexts */
  public get title(): string | undefined {
    return this.#title;
  }

  /** human-readable explanation of what this tool does */
  public get description(): string {
    return this.#description;
  }

  /** JSON Schema defining the structure of arguments this tool accepts */
  public get inputSchema(): JsonSchema {
    return this.#inputSchema;
  }

  /** optional metadata or annotations */
  public get annotations(): ToolAnnotations | undefined {
    return this.#annotations;
  }

  /**
   * executes the tool with the arguments sent by the client
   * @param args tool arguments
   * @param context what the handler can reach while it runs
   * @returns content produced by the tool
   * @throws {Error} when the arguments do not match the input schema
   */
  public async execute(
    args: Record<string, JsonifibleValue>,
    context: InvocationContext,
  ): Promise<ContentBlock[]> {
    if (!this.#verifyInput(args)) {
      const errors = this.#verifyInput.errors
        ? this.#verifyInput.errors
            .map((error) => `${error.instancePath || 'root'}: ${error.message}`)
            .join(', ')
        : 'validation failed';

      throw new Error(`Invalid input data: ${errors}`);
    }

    return this.#handler(args, context);
  }

  /**
   * generates the definition announced by tools/list
   * @returns tool definition without absent optional fields
   */
  public toSpec(): ToolSpec {
    return {
      name: this.name,
      description: this.description,
      inputSchema: this.inputSchema,
      ...(this.title !== undefined && { title: this.title }),
      ...(this.annotations && { annotations: this.annotations }),
    };
  }
}
