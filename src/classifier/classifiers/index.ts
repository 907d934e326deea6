import type { ClassifierConfig } from '../ClassifierConfig';
import type { LabelClassifier } from '../types';
import { BackgroundClassifier } from './BackgroundClassifier';
import { BagNumberClassifier } from './BagNumberClassifier';
import { DiagramClassifier } from './DiagramClassifier';
import { DividerClassifier } from './DividerClassifier';
import { NewBagClassifier } from './NewBagClassifier';
import { PageClassifier } from './PageClassifier';
import { PageNumberClassifier } from './PageNumberClassifier';
import { PartClassifier } from './PartClassifier';
import { PartCountClassifier } from './PartCountClassifier';
import { PartImageClassifier } from './PartImageClassifier';
import { PartNumberClassifier } from './PartNumberClassifier';
import { PartsListClassifier } from './PartsListClassifier';
import { PieceLengthClassifier } from './PieceLengthClassifier';
import { ProgressBarClassifier } from './ProgressBarClassifier';
import { StepClassifier } from './StepClassifier';
import { StepNumberClassifier } from './StepNumberClassifier';

/**
 * The stock classifier set. Registration order breaks ties between
 * classifiers that become ready at the same time.
 */
export function createDefaultClassifiers(config: ClassifierConfig): LabelClassifier[] {
  return [
    new PageNumberClassifier(config),
    new StepNumberClassifier(config),
    new PartCountClassifier(config),
    new PartNumberClassifier(config),
    new BagNumberClassifier(config),
    new BackgroundClassifier(config),
    new ProgressBarClassifier(config),
    new DividerClassifier(config),
    new PartImageClassifier(config),
    new PieceLengthClassifier(config),
    new PartClassifier(config),
    new PartsListClassifier(config),
    new NewBagClassifier(config),
    new DiagramClassifier(config),
    new StepClassifier(),
    new PageClassifier(),
  ];
}

export {
  BackgroundClassifier,
  BagNumberClassifier,
  DiagramClassifier,
  DividerClassifier,
  NewBagClassifier,
  PageClassifier,
  PageNumberClassifier,
  PartClassifier,
  PartCountClassifier,
  PartImageClassifier,
  PartNumberClassifier,
  PartsListClassifier,
  PieceLengthClassifier,
  ProgressBarClassifier,
  StepClassifier,
  StepNumberClassifier,
};
