// packages/triage/src/classifiers/injection.ts
import { firstMatch, firstPattern } from './shared.js';
import { verdict, type FindingClassifier } from './types.js';

// wins over placeholders: "... WHERE a = ?" + extra still concatenates
const SQL_CONCAT: readonly RegExp[] = [
  /\+\s*["'`]/,
  /["'`]\s*\+/,
  /\bf["']/,
  /\.format\(/,
  /["']\s+%\s*[\w(]/,
  /`[^`]*\$\{/,
];

const SQL_PARAMETERIZED: readonly RegExp[] = [
  /\?/,
  /\$\d/,
  /[=(,]\s*:[a-z_]\w*/i,
  /%s["']\s*,/,
  /prepare/i,
  /bindparam/i,
];

export const sqlInjectionClassifier: FindingClassifier = {
  id: 'sql-injection',
  classify({ code }) {
    const concat = firstPattern(code, SQL_CONCAT);
    if (concat) {
      return verdict(this.id, 'true_positive', 0.8, `Query is built by string concatenation or formatting (${concat.source}).`);
    }
    const param = firstPattern(code, SQL_PARAMETERIZED);
    if (param) {
      return verdict(this.id, 'false_positive', 0.7, `Query uses bound parameters (${param.source}).`);
    }
    return verdict(this.id, 'needs_review', 0.5, 'Could not tell how the query is constructed.');
  },
};

const SHELL_SINKS = ['shell=true', 'os.system(', 'os.popen(', 'commands.getoutput(', 'execsync(', 'exec(', 'shell_exec(', 'passthru('];
const SHELL_SAFE = [
  'shlex.quote',
  'shlex.split',
  'escapeshellarg',
  'shell=false',
  'execfile(',
  'execfilesync(',
  'spawn(',
  'run([',
  'call([',
  'popen([',
  'check_output([',
];

export const commandInjectionClassifier: FindingClassifier = {
  id: 'command-injection',
  classify({ code }) {
    const lower = code.toLowerCase().replace(/\s*=\s*/g, '=');
    const sink = firstMatch(lower, SHELL_SINKS);
    const safe = firstMatch(lower, SHELL_SAFE);

    if (sink && safe) {
      return verdict(this.id, 'needs_review', 0.6, `Shell execution (${sink}) next to argument quoting (${safe}). Verify every argument is quoted.`);
    }
    if (safe) {
      return verdict(this.id, 'false_positive', 0.7, `Arguments are passed without a shell or quoted (${safe}).`);
    }
    if (sink) {
      return verdict(this.id, 'true_positive', 0.8, `Command runs through a shell (${sink}).`);
    }
    return verdict(this.id, 'needs_review', 0.5, 'Could not identify how the command is executed.');
  },
};
