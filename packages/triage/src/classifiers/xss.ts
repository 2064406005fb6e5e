// packages/triage/src/classifiers/xss.ts
import { firstMatch } from './shared.js';
import { verdict, type FindingClassifier } from './types.js';

const ENCODING = [
  'escape(',
  'htmlescape',
  'html.escape',
  'sanitize',
  'encode(',
  'encodeuri',
  'textcontent',
  'innertext',
  'createtextnode',
];

const SINKS = ['innerhtml', 'outerhtml', 'document.write', 'eval(', 'v-html', 'dangerouslysetinnerhtml', '|safe', 'mark_safe('];

export const xssClassifier: FindingClassifier = {
  id: 'xss',
  classify({ code }) {
    const lower = code.toLowerCase();
    const safe = firstMatch(lower, ENCODING);
    if (safe) {
      return verdict(this.id, 'false_positive', 0.75, `Output is encoded (${safe}).`);
    }
    const sink = firstMatch(lower, SINKS);
    if (sink) {
      return verdict(this.id, 'true_positive', 0.8, `Unescaped HTML sink: ${sink}.`);
    }
    return verdict(this.id, 'needs_review', 0.5, 'No encoding or known HTML sink on the flagged code.');
  },
};
