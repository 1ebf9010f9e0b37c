//
// Line-level three-way merge for generated config files. Given the text the
// generator wrote last time (base), the file currently on disk (ours, which
// may carry hand edits), and the freshly generated text (theirs), this keeps
// hand edits that do not overlap regenerated lines. Where both sides changed
// the same lines the generated version (theirs) wins.
//
import { diff3Merge } from 'node-diff3';

export type LineMergeResult = {
  content: string;
  hadConflicts: boolean;
};

export const mergeDocumentLines = (
  base: string,
  ours: string,
  theirs: string,
): LineMergeResult => {
  if (base === theirs) {
    return { content: ours, hadConflicts: false };
  }
  if (base === ours) {
    return { content: theirs, hadConflicts: false };
  }
  if (ours === theirs) {
    return { content: theirs, hadConflicts: false };
  }

  // diff3Merge argument order: (a=ours, o=base, b=theirs).
  // excludeFalseConflicts treats identical changes from both sides as clean.
  const regions = diff3Merge(ours.split('\n'), base.split('\n'), theirs.split('\n'), {
    excludeFalseConflicts: true,
  });

  let hadConflicts = false;
  const mergedLines: string[] = [];

  for (const region of regions) {
    if (region.ok) {
      mergedLines.push(...region.ok);
    } else if (region.conflict) {
      hadConflicts = true;
      mergedLines.push(...region.conflict.b);
    }
  }

  return {
    content: mergedLines.join('\n'),
    hadConflicts,
  };
};
