export type ToolHandler = (argument: string) => Promise<string> | string;

/**
 * A locally executable function exposed to the model by name and description.
 * The model passes a single string argument, named `parameterName` when the
 * tool is advertised as a native function definition.
 */
export interface ToolSpec {
  readonly name: string;
  readonly description: string;
  readonly parameterName: string;
  /** Substituted when the argument is empty or equals this value (case-insensitive). */
  readonly defaultArgument?: string;
  readonly handler: ToolHandler;
}

export interface ToolInvocation {
  toolName: string;
  rawArgument: string;
}
