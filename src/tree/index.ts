import type { FileNode, LanguageId, TreeNode } from '../parser/types.js';

export interface TreeSummary {
  total_files: number;
  metta_files: number;
  other_files: number;
  errors: number;
}

/**
 * Keep only files of `language`. Folders left without children are
 * pruned; returns null when nothing remains.
 */
export function filterTreeByLanguage(tree: TreeNode, language: LanguageId): TreeNode | null {
  if (tree.type === 'file') {
    return tree.language === language ? tree : null;
  }

  const children: TreeNode[] = [];
  for (const child of tree.children) {
    const kept = filterTreeByLanguage(child, language);
    if (kept) {
      children.push(kept);
    }
  }

  return children.length > 0 ? { ...tree, children } : null;
}

export function collectFiles(tree: TreeNode): FileNode[] {
  if (tree.type === 'file') {
    return [tree];
  }
  return tree.children.flatMap(collectFiles);
}

export function summarizeTree(tree: TreeNode): TreeSummary {
  const summary: TreeSummary = { total_files: 0, metta_files: 0, other_files: 0, errors: 0 };

  for (const file of collectFiles(tree)) {
    summary.total_files++;
    if (file.language === 'metta') {
      summary.metta_files++;
    } else {
      summary.other_files++;
    }
    if (file.parse_error !== undefined) {
      summary.errors++;
    }
  }

  return summary;
}
