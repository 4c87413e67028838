/**
 * Planner output handling: lenient JSON extraction, validation and
 * deterministic fallback questions.
 */

import { z } from 'zod';
import { PlanningError } from '../errors.js';

const FALLBACK_TEMPLATES = [
  'Research comprehensive information about: {task}',
  'Analyze and provide insights about: {task}',
  'Find alternative perspectives on: {task}',
  'Verify and cross-check facts about: {task}',
];

const questionListSchema = z.array(z.string().trim().min(1)).min(1);

/**
 * Replace `{key}` placeholders whose key is in `values`; others stay as written.
 */
export function fillTemplate(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder: string, key: string) =>
    Object.hasOwn(values, key) ? String(values[key]) : placeholder
  );
}

export function fallbackQuestion(task: string, index: number): string {
  const base = fillTemplate(FALLBACK_TEMPLATES[index % FALLBACK_TEMPLATES.length], { task });
  return index < FALLBACK_TEMPLATES.length ? base : `${base} (angle ${index + 1})`;
}

export function fallbackQuestions(task: string, n: number): string[] {
  return Array.from({ length: n }, (_, index) => fallbackQuestion(task, index));
}

function candidates(raw: string): string[] {
  const trimmed = raw.trim();
  const found = [trimmed];

  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(trimmed);
  if (fenced) {
    found.push(fenced[1].trim());
  }

  const start = trimmed.indexOf('[');
  const end = trimmed.lastIndexOf(']');
  if (start !== -1 && end > start) {
    found.push(trimmed.slice(start, end + 1));
  }
  return found;
}

/**
 * Find a JSON array of non-empty strings in planner output.
 *
 * @throws PlanningError when no candidate parses and validates
 */
export function parseQuestions(raw: string): string[] {
  let lastProblem = 'no JSON array found';

  for (const candidate of candidates(raw)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(candidate);
    } catch {
      continue;
    }
    const result = questionListSchema.safeParse(parsed);
    if (result.success) {
      return result.data;
    }
    lastProblem = result.error.issues[0]?.message ?? 'invalid question list';
  }

  throw new PlanningError(`Planner output is not a usable question list: ${lastProblem}`, raw);
}

/**
 * Exactly `n` questions: extras are dropped, gaps are filled from the fallback templates.
 */
export function fitQuestions(questions: string[], task: string, n: number): string[] {
  if (questions.length >= n) {
    return questions.slice(0, n);
  }
  return [...questions, ...Array.from({ length: n - questions.length }, (_, i) => fallbackQuestion(task, questions.length + i))];
}
