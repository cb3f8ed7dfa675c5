import type { FlowSpec } from "../../domain/flows/FlowSpec";

export interface FlowLibraryPort {
  save(spec: FlowSpec): void;
  get(name: string): FlowSpec | null;
  /** Insertion order: flows found at load time by name, then in save order. */
  list(): string[];
  remove(name: string): boolean;
}
