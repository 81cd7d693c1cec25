import dotenv from 'dotenv';
import { resolve } from 'path';
import { InvalidRequestError } from '@/core/errors';

/**
 * Loads credentials into `env`: the file named by --env-file when present,
 * otherwise .env.local then .env. Values already set in the environment win.
 * Only an explicitly named file has to exist.
 */
export function loadEnvFiles(argv: string[], cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): string[] {
  const flagIndex = argv.findIndex((arg) => arg === '--env-file' || arg.startsWith('--env-file='));
  const explicit =
    flagIndex < 0
      ? null
      : argv[flagIndex].includes('=')
        ? argv[flagIndex].slice('--env-file='.length)
        : (argv[flagIndex + 1] ?? null);

  const files = explicit ? [resolve(cwd, explicit)] : [resolve(cwd, '.env.local'), resolve(cwd, '.env')];
  for (const path of files) {
    const result = dotenv.config({ path, processEnv: env });
    if (explicit && result.error) {
      throw new InvalidRequestError(`env file not found: ${path}`);
    }
  }
  return files;
}
