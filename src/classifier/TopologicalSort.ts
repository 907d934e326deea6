/**
 * Classifier Scheduling
 *
 * Orders classifiers so that every classifier runs after the producers of
 * the labels it requires. Among classifiers that are ready at the same time
 * the one registered first runs first, which keeps the order stable across
 * runs and lets registration order act as a tie-break.
 */

import { ClassifierConfigError } from './errors';
import type { Label } from './types';

interface SortNode {
  readonly name: string;
  readonly output: Label;
  readonly requires: ReadonlySet<Label>;
}

function producersByLabel<T extends SortNode>(classifiers: readonly T[]): Map<Label, T> {
  const producers = new Map<Label, T>();
  for (const classifier of classifiers) {
    const existing = producers.get(classifier.output);
    if (existing !== undefined) {
      throw new ClassifierConfigError(
        'duplicate-output',
        `Duplicate output label '${classifier.output}' found in ${existing.name} and ${classifier.name}`,
      );
    }
    producers.set(classifier.output, classifier);
  }
  return producers;
}

/** Follow requirement edges from `start` until a node repeats; returns the loop. */
function findCycle<T extends SortNode>(start: T, producers: ReadonlyMap<Label, T>, remaining: ReadonlySet<T>): T[] {
  const path: T[] = [];
  const seen = new Map<T, number>();
  let current: T | undefined = start;

  while (current !== undefined && !seen.has(current)) {
    seen.set(current, path.length);
    path.push(current);
    let next: T | undefined;
    for (const label of current.requires) {
      const producer = producers.get(label);
      if (producer !== undefined && remaining.has(producer)) {
        next = producer;
        break;
      }
    }
    current = next;
  }

  if (current === undefined) return path;
  const loopStart = seen.get(current) ?? 0;
  return [...path.slice(loopStart), current];
}

/**
 * Kahn's algorithm with the lowest registration index taken first.
 * Throws ClassifierConfigError on duplicate outputs, unmet requirements
 * and cycles.
 */
export function topologicalSort<T extends SortNode>(classifiers: readonly T[]): T[] {
  const producers = producersByLabel(classifiers);

  for (const classifier of classifiers) {
    for (const label of classifier.requires) {
      if (!producers.has(label)) {
        throw new ClassifierConfigError(
          'missing-requirement',
          `Classifier '${classifier.name}' requires label '${label}' which no registered classifier produces`,
        );
      }
    }
  }

  const remaining = new Set<T>(classifiers);
  const done = new Set<Label>();
  const ordered: T[] = [];

  while (remaining.size > 0) {
    // Set iteration follows insertion, i.e. registration order
    let ready: T | undefined;
    for (const classifier of remaining) {
      if ([...classifier.requires].every(label => done.has(label))) {
        ready = classifier;
        break;
      }
    }

    if (ready === undefined) {
      const [first] = remaining;
      const cycle = findCycle(first, producers, remaining);
      throw new ClassifierConfigError(
        'cycle',
        `Circular dependency detected among classifiers: ${cycle.map(c => c.name).join(' -> ')}`,
      );
    }

    remaining.delete(ready);
    done.add(ready.output);
    ordered.push(ready);
  }

  return ordered;
}
