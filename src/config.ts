import 'dotenv/config';
import { join } from 'path';

export const config = {
  get PORT() { return parseInt(process.env.PORT || '8000', 10); },
  get HOST() { return process.env.HOST || '0.0.0.0'; },
  get CATALOG_FILE() { return process.env.CATALOG_FILE || join(process.cwd(), 'data', 'activities.json'); },
  get STATIC_DIR() { return process.env.STATIC_DIR || join(process.cwd(), 'public'); },
  get LOG_REQUESTS() { return process.env.LOG_REQUESTS !== 'false'; },
};

export function configProblems(): string[] {
  const problems: string[] = [];
  const port = config.PORT;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    problems.push(`PORT must be an integer between 0 and 65535 (got "${process.env.PORT}")`);
  }
  if (!config.HOST.trim()) {
    problems.push('HOST must not be blank');
  }
  return problems;
}

export function validateConfig(): void {
  const problems = configProblems();
  if (problems.length > 0) {
    for (const problem of problems) console.error(`Invalid configuration: ${problem}`);
    console.error('Check your .env file. See .env.example');
    process.exit(1);
  }
}
