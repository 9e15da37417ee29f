// lib/scenario/loadScenarioFile.ts

import { readFile } from 'node:fs/promises';
import { ScenarioError, errorMessage } from '../errors';
import { normalizeScenario } from './normalizeScenario';
import type { Scenario } from './types';

export async function loadScenarioFile(path: string): Promise<Scenario> {
  const text = await readFile(path, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ScenarioError([`${path}: invalid JSON (${errorMessage(e)})`]);
  }
  return normalizeScenario(raw);
}
