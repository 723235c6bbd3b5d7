import type { Strategy } from './Strategy.ts';

import { EliminationStrategy } from './EliminationStrategy.ts';
import { NakedTwinsStrategy } from './NakedTwinsStrategy.ts';
import { OnlyChoiceStrategy } from './OnlyChoiceStrategy.ts';

export function createDefaultStrategies(): Strategy[] {
  return [
    new EliminationStrategy(),
    new NakedTwinsStrategy(),
    new OnlyChoiceStrategy()
  ];
}
