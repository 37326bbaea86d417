/**
 * Registry of postprocess functions addressable by dotted name
 *
 * Modules that provide postprocessors register them under a module path at
 * load time; configurations then name a function as
 * `<module-path>.<identifier>`. Names are only checked when a pipeline
 * resolves them, so a misspelt name fails at run time, not at load time.
 */

import { type } from "arktype";
import { ResolutionError, ValidationError } from "../errors";
import type { PostprocessFunction } from "../types";
import { FunctionNameSchema, IdentifierSchema, ModulePathSchema } from "../types";

export class PostprocessRegistry {
  private readonly modules = new Map<string, Map<string, PostprocessFunction>>();

  /**
   * Register the postprocess functions one module provides
   *
   * @throws {ValidationError} When the module path is not a dotted identifier path
   * @throws {ResolutionError} When a name is already registered
   *
   * @example
   * ```typescript
   * registry.register("lab.postprocess", { strip_scaffolds: stripScaffolds });
   * registry.resolve("lab.postprocess.strip_scaffolds");
   * ```
   */
  register(modulePath: string, functions: Readonly<Record<string, PostprocessFunction>>): void {
    if (ModulePathSchema(modulePath) instanceof type.errors) {
      throw new ValidationError(`Invalid module path '${modulePath}'`);
    }

    const existing = this.modules.get(modulePath);
    for (const identifier of Object.keys(functions)) {
      const name = `${modulePath}.${identifier}`;
      if (IdentifierSchema(identifier) instanceof type.errors) {
        throw new ValidationError(`Invalid postprocess function name '${name}'`);
      }
      if (existing?.has(identifier) === true) {
        throw new ResolutionError(`Postprocess function '${name}' is already registered`, name);
      }
    }

    const entries = existing ?? new Map<string, PostprocessFunction>();
    for (const [identifier, fn] of Object.entries(functions)) {
      entries.set(identifier, fn);
    }
    this.modules.set(modulePath, entries);
  }

  /**
   * Resolve a dotted name to its function
   *
   * @throws {ResolutionError} When the name is malformed, the module is
   * unknown or the module has no such function
   */
  resolve(name: string): PostprocessFunction {
    if (FunctionNameSchema(name) instanceof type.errors) {
      throw new ResolutionError(
        `Cannot resolve '${name}': expected <module-path>.<identifier>`,
        name
      );
    }

    const separator = name.lastIndexOf(".");
    const modulePath = name.slice(0, separator);
    const identifier = name.slice(separator + 1);

    const entries = this.modules.get(modulePath);
    if (entries === undefined) {
      throw new ResolutionError(
        `Cannot resolve '${name}': no module '${modulePath}' is registered`,
        name,
        `Registered modules: ${[...this.modules.keys()].join(", ") || "none"}`
      );
    }

    const fn = entries.get(identifier);
    if (fn === undefined) {
      throw new ResolutionError(
        `Cannot resolve '${name}': module '${modulePath}' has no function '${identifier}'`,
        name,
        `Functions in ${modulePath}: ${[...entries.keys()].join(", ")}`
      );
    }
    return fn;
  }

  has(name: string): boolean {
    const separator = name.lastIndexOf(".");
    return separator > 0 && this.modules.get(name.slice(0, separator))?.has(name.slice(separator + 1)) === true;
  }

  /**
   * Every registered name, sorted
   */
  names(): string[] {
    return [...this.modules]
      .flatMap(([modulePath, entries]) => [...entries.keys()].map((id) => `${modulePath}.${id}`))
      .sort();
  }
}

/**
 * Process-wide registry consulted by the pipeline unless told otherwise
 */
export const postprocessRegistry = new PostprocessRegistry();

export function registerPostprocessors(
  modulePath: string,
  functions: Readonly<Record<string, PostprocessFunction>>
): void {
  postprocessRegistry.register(modulePath, functions);
}

export function resolvePostprocessor(name: string): PostprocessFunction {
  return postprocessRegistry.resolve(name);
}
