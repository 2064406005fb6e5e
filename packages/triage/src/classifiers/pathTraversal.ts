// packages/triage/src/classifiers/pathTraversal.ts
import { firstMatch } from './shared.js';
import { verdict, type FindingClassifier } from './types.js';

const VALIDATION = [
  'realpath',
  'abspath',
  'normpath',
  'resolve()',
  '.startswith(',
  'is_relative_to',
  'secure_filename',
  'path.basename',
  'os.path.basename',
];

const FILE_OPS = [
  'open(',
  'read(',
  'readfile',
  'file_get_contents',
  'include(',
  'require(',
  'send_file',
  'sendfile',
  'createreadstream',
];

export const pathTraversalClassifier: FindingClassifier = {
  id: 'path-traversal',
  classify({ code }) {
    const lower = code.toLowerCase();
    const validation = firstMatch(lower, VALIDATION);
    const fileOp = firstMatch(lower, FILE_OPS);

    if (validation && fileOp) {
      return verdict(this.id, 'needs_review', 0.6, `File access (${fileOp}) with some path validation (${validation}). Verify it runs before the access.`);
    }
    if (validation) {
      return verdict(this.id, 'false_positive', 0.7, `Path is validated (${validation}).`);
    }
    if (fileOp) {
      return verdict(this.id, 'true_positive', 0.7, `File access (${fileOp}) without path validation.`);
    }
    return verdict(this.id, 'needs_review', 0.5, 'No file operation or path validation on the flagged code.');
  },
};
