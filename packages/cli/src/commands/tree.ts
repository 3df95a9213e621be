import chalk from 'chalk';
import type { Command } from 'commander';
import type { TranslationTree, TranslationTreeNode } from '@dotlex/core';
import { withErrorHandling } from '../utils/errors.js';
import { loadProject } from '../utils/project.js';

interface TreeCommandOptions {
  config?: string;
  json?: boolean;
  cwd?: string;
}

export interface SerializedTreeNode {
  name: string;
  keys: Array<{ key: string; isTemplated: boolean }>;
  children: SerializedTreeNode[];
}

export function serializeTreeNode(node: TranslationTreeNode): SerializedTreeNode {
  return {
    name: node.name,
    keys: node.keys.map((leaf) => ({ key: leaf.key, isTemplated: leaf.isTemplated })),
    children: node.childNodes.map(serializeTreeNode),
  };
}

/**
 * Render a node's leaves, then its child groups, indenting each level by two spaces.
 */
export function renderTreeNode(node: TranslationTreeNode, depth = 0): string[] {
  const indent = '  '.repeat(depth);
  const lines: string[] = [];

  for (const leaf of node.keys) {
    lines.push(`${indent}${leaf.key}${leaf.isTemplated ? chalk.yellow(' [templated]') : ''}`);
  }
  for (const child of node.childNodes) {
    lines.push(chalk.cyan(`${indent}${child.name}/`));
    lines.push(...renderTreeNode(child, depth + 1));
  }

  return lines;
}

export function registerTree(program: Command) {
  program
    .command('tree')
    .description('Print the key hierarchy of the default translation file')
    .option('-c, --config <path>', 'Path to dotlex config file')
    .option('--json', 'Print the tree as JSON', false)
    .action(
      withErrorHandling(async (options: TreeCommandOptions) => {
        await runTree(options);
      })
    );
}

export async function runTree(options: TreeCommandOptions = {}): Promise<TranslationTree> {
  const { loader } = await loadProject({ config: options.config, cwd: options.cwd });
  const tree = await loader.loadStructure();

  if (options.json) {
    console.log(JSON.stringify(serializeTreeNode(tree.rootNode), null, 2));
  } else {
    for (const line of renderTreeNode(tree.rootNode)) {
      console.log(line);
    }
  }
  return tree;
}
