/** Reads a positive integer id from the environment. */
export function envId(name: string, env: NodeJS.ProcessEnv = process.env): number {
  const value = Number(env[name]);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Environment variable ${name} must be a positive integer id`);
  }
  return value;
}
