export interface ToolParameter {
  type: "string";
  description: string;
}

/**
 * A named text-in/text-out capability handed to an external orchestrator.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, ToolParameter>;
  invoke(input: unknown): Promise<string>;
}
