/**
 * DeceptionClassifier - flags statements that brush against a secret
 *
 * Word overlap between a statement and one of the speaker's secrets is a
 * candidate omission signal. There is no lie detection: likelyLies is
 * always empty until a real detector is plugged in here.
 */

import type { DeceptionAnalysis, SecretHolder } from '../../types/index.js';

function wordSet(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/\s+/).filter((word) => word.length > 0));
}

export class DeceptionClassifier {
  analyzeForDeception(statement: string, character: SecretHolder): DeceptionAnalysis {
    const likelyLies: string[] = [];
    const likelyOmissions: string[] = [];
    const statementWords = wordSet(statement);

    for (const secret of character.secrets) {
      const overlaps = [...wordSet(secret)].some((word) => statementWords.has(word));
      if (overlaps) {
        likelyOmissions.push(`Potential omission related to: ${secret}`);
      }
    }

    return { likelyLies, likelyOmissions };
  }
}
