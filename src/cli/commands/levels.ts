import { getLevels } from '../../utils/logging/index.js';
import { output } from '../output.js';

export function levelsCommand(): void {
  output.list(getLevels());
}
