/**
 * Produces tool source from a natural-language description. The source must
 * define one top-level function named `name`.
 */
export interface ToolGeneratorPort {
  generate(name: string, description: string): Promise<string>;
}
