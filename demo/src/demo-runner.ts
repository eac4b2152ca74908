import type { Logger } from 'pino';
import { describeNode, formatTraversal, renderTree, type RedBlackTree } from 'rb-tree';
import { buildSampleTree, type Sample } from './sample-loader.js';

export interface DemoOptions {
  logger: Logger;
  write: (line: string) => void;    // Receives each output line, console.log by default
}

/**
 * Builds the sample tree, prints it in pre-order, searches each key and
 * reports the validation result and rebalancing counters
 * @returns The built tree
 */
export function runDemo(sample: Sample, searchKeys: string[], options: DemoOptions): RedBlackTree<string> {
  const { logger, write } = options;

  logger.info(`Building ${sample.name} from ${sample.keys.length} keys`);
  const tree = buildSampleTree(sample, logger.child({ module: 'rb-tree' }));

  write(`Sample ${sample.name}: ${sample.description}`);
  write(`Pre-Order tree ==> ${formatTraversal(tree, 'pre')}`);

  for (const key of searchKeys) {
    const node = tree.search(key);
    if (node) {
      write(`Key ${key} was found in the tree.`);
      write(describeNode(tree, node));
    } else {
      write(`Key ${key} not found in the tree.`);
    }
  }

  renderTree(tree).split('\n').forEach(line => write(line));

  const report = tree.validate();
  if (report.valid) {
    write(`Validation: OK (black height ${report.blackHeight}, height ${report.height}, ${report.size} nodes)`);
  } else {
    logger.warn(`Validation of ${sample.name} found ${report.violations.length} violations`);
    write('Validation: FAILED');
    report.violations.forEach(violation => write(`  - ${violation}`));
  }

  const stats = tree.getStats();
  write(`Rebalancing: ${stats.colorFlips} color flips, ${stats.leftRotations} left rotations, ${stats.rightRotations} right rotations`);

  return tree;
}
