// OSC 1.0 address pattern matching, one '/'-separated token at a time.
// Wildcards never cross a '/' boundary.

const WILDCARD = /[*?[\]{}]/;

export function isPattern(s: string): boolean {
  return WILDCARD.test(s);
}

/** Parses `[...]` starting at `open`; undefined when the bracket is unterminated. */
function readClass(
  pattern: string,
  open: number,
): { end: number; test: (ch: string) => boolean } | undefined {
  let i = open + 1;
  let negate = false;
  if (pattern[i] === '!') {
    negate = true;
    i++;
  }
  const close = pattern.indexOf(']', i);
  if (close === -1) return undefined;
  const body = pattern.slice(i, close);
  const ranges: Array<[number, number]> = [];
  for (let j = 0; j < body.length; j++) {
    const lo = body.charCodeAt(j);
    if (body[j + 1] === '-' && j + 2 < body.length) {
      const hi = body.charCodeAt(j + 2);
      ranges.push(lo <= hi ? [lo, hi] : [hi, lo]);
      j += 2;
    } else {
      ranges.push([lo, lo]);
    }
  }
  return {
    end: close + 1,
    test: (ch) => {
      const code = ch.charCodeAt(0);
      const hit = ranges.some(([lo, hi]) => code >= lo && code <= hi);
      return negate ? !hit : hit;
    },
  };
}

type Step =
  | { kind: 'star' }
  | { kind: 'char'; test: (ch: string) => boolean }
  | { kind: 'alt'; options: string[] };

function compile(pattern: string): Step[] {
  const steps: Step[] = [];
  let pi = 0;
  while (pi < pattern.length) {
    const p = pattern.charAt(pi);
    if (p === '*') {
      // collapse runs of '*'
      if (steps[steps.length - 1]?.kind !== 'star') steps.push({ kind: 'star' });
      pi++;
      continue;
    }
    if (p === '?') {
      steps.push({ kind: 'char', test: () => true });
      pi++;
      continue;
    }
    if (p === '[') {
      const cls = readClass(pattern, pi);
      if (cls) {
        steps.push({ kind: 'char', test: cls.test });
        pi = cls.end;
        continue;
      }
    }
    if (p === '{') {
      const close = pattern.indexOf('}', pi);
      if (close !== -1) {
        steps.push({ kind: 'alt', options: pattern.slice(pi + 1, close).split(',') });
        pi = close + 1;
        continue;
      }
    }
    // literal character (including an unterminated '[' or '{')
    steps.push({ kind: 'char', test: (ch) => ch === p });
    pi++;
  }
  return steps;
}

/**
 * Tracks the set of text offsets reachable after each step, so a token
 * costs O(steps x text length) whatever the number of '*'.
 */
function matchToken(pattern: string, text: string): boolean {
  let reach: boolean[] = new Array<boolean>(text.length + 1).fill(false);
  reach[0] = true;
  for (const step of compile(pattern)) {
    const next: boolean[] = new Array<boolean>(text.length + 1).fill(false);
    let any = false;
    switch (step.kind) {
      case 'star': {
        const first = reach.indexOf(true);
        for (let k = first; k <= text.length; k++) next[k] = true;
        any = true;
        break;
      }
      case 'char':
        for (let k = 0; k < text.length; k++) {
          if (reach[k] && step.test(text.charAt(k))) {
            next[k + 1] = true;
            any = true;
          }
        }
        break;
      case 'alt':
        for (let k = 0; k <= text.length; k++) {
          if (!reach[k]) continue;
          for (const option of step.options) {
            if (text.startsWith(option, k)) {
              next[k + option.length] = true;
              any = true;
            }
          }
        }
        break;
    }
    if (!any) return false;
    reach = next;
  }
  return reach[text.length] === true;
}

/**
 * True when `address` matches the OSC address `pattern`.
 * Never throws; malformed wildcard syntax is matched literally.
 */
export function matches(pattern: string, address: string): boolean {
  if (pattern === address) return true;
  if (typeof pattern !== 'string' || typeof address !== 'string') return false;
  const patternTokens = pattern.split('/');
  const addressTokens = address.split('/');
  if (patternTokens.length !== addressTokens.length) return false;
  for (let i = 0; i < patternTokens.length; i++) {
    const p = patternTokens[i] ?? '';
    const a = addressTokens[i] ?? '';
    if (p === a) continue;
    if (!isPattern(p) || !matchToken(p, a)) return false;
  }
  return true;
}
