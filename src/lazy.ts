/**
 * Load a module on first use. The specifier is a plain string so the module
 * is resolved at run time only; callers narrow the result with a type guard.
 */
export async function loadModule(specifier: string): Promise<unknown> {
  const mod: unknown = await import(specifier);
  return mod;
}
