/**
 * Human-readable report of what happened to a mock: every recorded call
 * in sequence order, then the stubbings that were set up.
 */

import chalk, { Chalk } from 'chalk';
import type { ChalkInstance } from 'chalk';
import { getGenericMockFrom } from '../../core/dsl/mock-factory.js';
import { formatMatchers } from '../../core/matching/matchers.js';
import { formatList } from '../utils/format.js';

export interface InteractionReportOptions {
  /** Colorize the output (default: true, subject to terminal support) */
  color?: boolean;
}

const plain = new Chalk({ level: 0 });

export function formatInteractions(mockObject: object, options: InteractionReportOptions = {}): string {
  const c: ChalkInstance = options.color === false ? plain : chalk;
  const engine = getGenericMockFrom(mockObject);
  const invocations = engine.getInvocations();
  const stubbings = engine.getStubbings();

  const lines = [c.bold(`Mock ${engine.name}`)];

  lines.push(`  Invocations (${invocations.length}):`);
  if (invocations.length === 0) {
    lines.push(c.gray('    (none)'));
  }
  for (const invocation of invocations) {
    lines.push(`    ${c.gray(`#${invocation.sequence}`)} ${c.cyan(invocation.methodName)} ${formatList(invocation.params)}`);
  }

  lines.push(`  Stubbings (${stubbings.length}):`);
  if (stubbings.length === 0) {
    lines.push(c.gray('    (none)'));
  }
  for (const stubbing of stubbings) {
    lines.push(
      `    ${c.cyan(stubbing.methodName)} ${formatMatchers(stubbing.matchers)} ${c.gray(`-> ${stubbing.answerCount} answer(s)`)}`,
    );
  }

  return lines.join('\n');
}

export function printInteractions(mockObject: object, options: InteractionReportOptions = {}): void {
  console.log(formatInteractions(mockObject, options));
}
