import { access } from 'node:fs/promises';
import { createServer } from 'node:net';
import type { Config } from '../config';

export type PreflightIssue = {
  severity: 'error' | 'warning';
  message: string;
};

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function checkDependencies(cfg: Config): Promise<PreflightIssue[]> {
  const issues: PreflightIssue[] = [];
  if (cfg.generationProvider === 'llama-cli') {
    if (!(await exists(cfg.llamaExecutable))) {
      issues.push({ severity: 'error', message: `generation executable not found: ${cfg.llamaExecutable}` });
    }
    if (!(await exists(cfg.modelPath))) {
      issues.push({ severity: 'error', message: `model file not found: ${cfg.modelPath}` });
    }
  }
  if (!(await exists(cfg.systemPromptFile))) {
    issues.push({
      severity: 'warning',
      message: `base instruction file not found, built-in text will be used: ${cfg.systemPromptFile}`
    });
  }
  return issues;
}

function canBind(host: string, port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const probe = createServer();
    probe.once('error', () => resolve(false));
    probe.once('listening', () => {
      probe.close(() => resolve(true));
    });
    probe.listen(port, host);
  });
}

export async function findFreePort(host: string, start: number, span: number): Promise<number | null> {
  for (let port = start; port < start + span; port += 1) {
    if (await canBind(host, port)) return port;
  }
  return null;
}
