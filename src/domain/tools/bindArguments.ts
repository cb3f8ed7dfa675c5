import type { ArgumentSlot } from "./ToolRecord";

function has(params: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(params, key);
}

/**
 * Lays named params out as the argument list the tool function expects. Throws
 * TypeError for missing required or unexpected names, as a direct call would.
 */
export function bindArguments(
  toolName: string,
  slots: ArgumentSlot[],
  params: Record<string, unknown>
): unknown[] {
  const args: unknown[] = [];
  const consumed = new Set<string>();
  let overflow: Record<string, unknown> | null = null;

  const missing = (name: string) =>
    new TypeError(`${toolName}() missing required argument '${name}'`);

  for (const slot of slots) {
    switch (slot.kind) {
      case "positional":
        if (has(params, slot.name)) {
          args.push(params[slot.name]);
          consumed.add(slot.name);
        } else if (slot.required) {
          throw missing(slot.name);
        } else {
          args.push(undefined);
        }
        break;
      case "rest":
        if (has(params, slot.name)) {
          const value = params[slot.name];
          consumed.add(slot.name);
          if (Array.isArray(value)) args.push(...value);
          else args.push(value);
        }
        break;
      case "keywords": {
        const keywords: Record<string, unknown> = {};
        for (const name of slot.names) {
          if (has(params, name)) {
            keywords[name] = params[name];
            consumed.add(name);
          } else if (slot.required.includes(name)) {
            throw missing(name);
          }
        }
        if (slot.restName !== null) overflow = keywords;
        args.push(keywords);
        break;
      }
    }
  }

  const unexpected = Object.keys(params).filter((key) => !consumed.has(key));
  if (unexpected.length) {
    if (!overflow) {
      throw new TypeError(
        `${toolName}() got unexpected argument${unexpected.length > 1 ? "s" : ""} ${unexpected
          .map((key) => `'${key}'`)
          .join(", ")}`
      );
    }
    for (const key of unexpected) overflow[key] = params[key];
  }

  return args;
}
