import path from "path";
import vm from "vm";
import { createRequire } from "module";
import ts from "typescript";
import { describeError, ValidationError } from "../../shared/errors";
import { parseSource, reflectDeclaredSignature, reflectRuntimeSignature } from "../../domain/tools/reflect";
import { TOOL_NAME_PATTERN } from "../../domain/tools/ToolRecord";
import type { CompiledTool, ToolLoaderPort } from "../../ports/tools/ToolLoaderPort";

const COMPILER_OPTIONS: ts.CompilerOptions = {
  module: ts.ModuleKind.CommonJS,
  target: ts.ScriptTarget.ES2022,
  esModuleInterop: true,
};

/**
 * Transpiles tool source with the TypeScript compiler and evaluates it in a
 * fresh vm context per tool, so top-level state never leaks between tools.
 */
export class VmToolLoader implements ToolLoaderPort {
  compile(name: string, source: string, sourcePath: string): CompiledTool {
    const output = ts.transpileModule(source, {
      compilerOptions: COMPILER_OPTIONS,
      fileName: sourcePath,
      reportDiagnostics: true,
    });
    const syntaxErrors = (output.diagnostics ?? []).filter(
      (d) => d.category === ts.DiagnosticCategory.Error
    );
    if (syntaxErrors.length) {
      const first = ts.flattenDiagnosticMessageText(syntaxErrors[0].messageText, "\n");
      throw new ValidationError(`Tool "${name}" does not compile: ${first}`, "source");
    }

    const moduleObject: { exports: unknown } = { exports: {} };
    const context = vm.createContext(this.buildSandbox(moduleObject, sourcePath));
    try {
      new vm.Script(output.outputText, { filename: sourcePath }).runInContext(context);
    } catch (err) {
      const { type, message } = describeError(err);
      throw new ValidationError(`Tool "${name}" failed to load: ${type}: ${message}`, "source");
    }

    const declaredSignature = reflectDeclaredSignature(parseSource(sourcePath, source), name);
    const fn = this.locate(name, moduleObject.exports, context, declaredSignature !== null);
    if (!fn) {
      throw new ValidationError(`Source does not define a callable named "${name}".`, "source");
    }

    const signature = declaredSignature ?? reflectRuntimeSignature(Function.prototype.toString.call(fn));

    return {
      callable: (...args: unknown[]) => Reflect.apply(fn, undefined, args),
      signature,
    };
  }

  private buildSandbox(moduleObject: { exports: unknown }, sourcePath: string): Record<string, unknown> {
    return {
      module: moduleObject,
      exports: moduleObject.exports,
      require: createRequire(sourcePath),
      __filename: sourcePath,
      __dirname: path.dirname(sourcePath),
      console,
      process,
      Buffer,
      URL,
      URLSearchParams,
      TextEncoder,
      TextDecoder,
      AbortController,
      fetch: globalThis.fetch,
      structuredClone: globalThis.structuredClone,
      queueMicrotask,
      setTimeout,
      clearTimeout,
      setInterval,
      clearInterval,
      setImmediate,
      clearImmediate,
    };
  }

  /**
   * An own exported binding first, then a top-level function the source itself
   * declares. Inherited members such as `toString` never count.
   */
  private locate(
    name: string,
    exported: unknown,
    context: vm.Context,
    declaredInSource: boolean
  ): Function | null {
    if (
      typeof exported === "object" &&
      exported !== null &&
      Object.prototype.hasOwnProperty.call(exported, name)
    ) {
      const candidate: unknown = Reflect.get(exported, name);
      if (typeof candidate === "function") return candidate;
    }
    if (typeof exported === "function" && exported.name === name) return exported;
    if (!declaredInSource || !TOOL_NAME_PATTERN.test(name)) return null;

    const declared: unknown = new vm.Script(
      `typeof ${name} === "function" ? ${name} : undefined`
    ).runInContext(context);
    return typeof declared === "function" ? declared : null;
  }
}
