import { describe, test, expect } from 'vitest';
import { topologicalSort } from '../TopologicalSort';
import { ClassifierConfigError } from '../errors';
import { createDefaultClassifiers } from '../classifiers';
import type { Label } from '../types';
import { makeConfig } from '../../test/factories';

function makeNode(name: string, output: Label, requires: Label[] = []) {
  return { name, output, requires: new Set<Label>(requires) };
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return null;
}

describe('topologicalSort', () => {
  test('producers run before consumers, registration order breaks ties', () => {
    const step = makeNode('Step', 'step', ['step_number']);
    const stepNumber = makeNode('StepNumber', 'step_number');
    const pageNumber = makeNode('PageNumber', 'page_number');

    expect(topologicalSort([step, stepNumber, pageNumber]).map(n => n.name)).toEqual(['StepNumber', 'Step', 'PageNumber']);
  });

  test('the stock classifiers keep their registration order', () => {
    const classifiers = createDefaultClassifiers(makeConfig());
    expect(topologicalSort(classifiers).map(c => c.name)).toEqual(classifiers.map(c => c.name));
  });

  test('duplicate outputs are rejected', () => {
    const err = captureError(() => topologicalSort([makeNode('A', 'divider'), makeNode('B', 'divider')]));
    expect(err).toBeInstanceOf(ClassifierConfigError);
    expect(err).toMatchObject({
      kind: 'duplicate-output',
      message: "Duplicate output label 'divider' found in A and B",
    });
  });

  test('a requirement nobody produces is rejected', () => {
    const err = captureError(() => topologicalSort([makeNode('Step', 'step', ['diagram'])]));
    expect(err).toMatchObject({
      kind: 'missing-requirement',
      message: "Classifier 'Step' requires label 'diagram' which no registered classifier produces",
    });
  });

  test('cycles are reported with their path', () => {
    const err = captureError(() =>
      topologicalSort([makeNode('X', 'part', ['parts_list']), makeNode('Y', 'parts_list', ['part'])]),
    );
    expect(err).toMatchObject({
      kind: 'cycle',
      message: 'Circular dependency detected among classifiers: X -> Y -> X',
    });
  });
});
