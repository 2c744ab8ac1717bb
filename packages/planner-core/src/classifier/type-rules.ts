/**
 * Commit type inference for a single changed file
 *
 * Each rule is a named predicate; the first rule that matches decides the type.
 */

import type { ChangedFile, ContentCategory, ConventionalType } from '@commit-planner/contracts';
import { countDiffLines, extractAddedLines } from '../analyzer/diff-lines';

/**
 * What the rules look at for one file
 */
export interface FileEvidence {
  path: string;
  category: ContentCategory;
  additions: number;
  deletions: number;
  /** Added lines joined with newlines */
  addedText: string;
}

export interface TypeRule {
  name: string;
  type: ConventionalType;
  matches(evidence: FileEvidence): boolean;
}

const DECLARATION_PATTERN = /\b(function|class|def|const|let|var)\s/;
const FEATURE_VOCABULARY = /\b(new|add|implement|create)/i;
const BUGFIX_VOCABULARY = /\b(fix|bug|error|issue|null|undefined)/i;
const REFACTOR_VOCABULARY = /\b(refactor|rename|move|extract)/i;
const PERFORMANCE_VOCABULARY = /\b(performance|optimi[sz]e|cache|memoi[sz]e)/i;

export const documentationRule: TypeRule = {
  name: 'documentation-extension',
  type: 'docs',
  matches: (e) => e.category === 'documentation',
};

export const testMarkerRule: TypeRule = {
  name: 'test-marker',
  type: 'test',
  matches: (e) => e.category === 'test',
};

export const ciMarkerRule: TypeRule = {
  name: 'ci-marker',
  type: 'ci',
  matches: (e) => e.category === 'ci',
};

export const dependencyManifestRule: TypeRule = {
  name: 'dependency-manifest',
  type: 'build',
  matches: (e) => e.category === 'build',
};

export const emptyChangeRule: TypeRule = {
  name: 'empty-change',
  type: 'chore',
  matches: (e) => e.addedText === '' && e.additions === 0 && e.deletions === 0,
};

export const newDeclarationRule: TypeRule = {
  name: 'new-declaration',
  type: 'feat',
  matches: (e) => DECLARATION_PATTERN.test(e.addedText) && FEATURE_VOCABULARY.test(e.addedText),
};

export const bugfixVocabularyRule: TypeRule = {
  name: 'bugfix-vocabulary',
  type: 'fix',
  matches: (e) => BUGFIX_VOCABULARY.test(e.addedText),
};

export const refactorVocabularyRule: TypeRule = {
  name: 'refactor-vocabulary',
  type: 'refactor',
  matches: (e) => REFACTOR_VOCABULARY.test(e.addedText),
};

export const performanceVocabularyRule: TypeRule = {
  name: 'performance-vocabulary',
  type: 'perf',
  matches: (e) => PERFORMANCE_VOCABULARY.test(e.addedText),
};

/** Same number of lines in and out usually means reformatting */
export const balancedChangeRule: TypeRule = {
  name: 'balanced-change',
  type: 'style',
  matches: (e) => e.additions > 0 && e.additions === e.deletions,
};

export const additionHeavyRule: TypeRule = {
  name: 'addition-heavy',
  type: 'feat',
  matches: (e) => e.additions > e.deletions * 2,
};

export const TYPE_RULES: readonly TypeRule[] = [
  documentationRule,
  testMarkerRule,
  ciMarkerRule,
  dependencyManifestRule,
  emptyChangeRule,
  newDeclarationRule,
  bugfixVocabularyRule,
  refactorVocabularyRule,
  performanceVocabularyRule,
  balancedChangeRule,
  additionHeavyRule,
];

export const FALLBACK_TYPE: ConventionalType = 'chore';

/**
 * Collect rule evidence. Line counts come from the file record, or from the
 * diff when the record carries none.
 */
export function toEvidence(file: ChangedFile): FileEvidence {
  const diff = file.diff ?? '';
  const counted =
    file.additions === 0 && file.deletions === 0 && diff !== ''
      ? countDiffLines(diff)
      : { additions: file.additions, deletions: file.deletions };

  return {
    path: file.path,
    category: file.category,
    additions: counted.additions,
    deletions: counted.deletions,
    addedText: extractAddedLines(diff).join('\n'),
  };
}

/**
 * First matching rule for the file, undefined when only the fallback applies
 */
export function matchTypeRule(file: ChangedFile, rules: readonly TypeRule[] = TYPE_RULES): TypeRule | undefined {
  const evidence = toEvidence(file);
  return rules.find((rule) => rule.matches(evidence));
}

export function inferType(file: ChangedFile, rules: readonly TypeRule[] = TYPE_RULES): ConventionalType {
  return matchTypeRule(file, rules)?.type ?? FALLBACK_TYPE;
}
