/**
 * REST path classifier
 *
 * Collapses Beacon API paths carrying slots, roots, validator indices and
 * peer ids into a bounded set of templates usable as a metric label.
 *
 * @module rpc/PathClassifier
 */

const NUMERIC = /^\d+$/;
const HEX = /^0x[0-9a-fA-F]*$/;
const TEMPLATE = /^\{[^{}]+\}$/;
const NAMED_IDS = new Set(['head', 'genesis', 'finalized', 'justified']);

/**
 * Segment under inspection plus up to two literal segments before it
 */
export interface SegmentContext {
  segment: string;
  prev1?: string;
  prev2?: string;
}

/**
 * One contextual rule. Rules are evaluated in list order and the first
 * matching rule wins.
 */
export interface PathRule {
  name: string;
  matches: (ctx: SegmentContext) => boolean;
  template: string;
}

export function isNumeric(segment: string): boolean {
  return NUMERIC.test(segment);
}

/**
 * 0x-prefixed hex of at least 32 bytes
 */
export function isRootHex(segment: string): boolean {
  return HEX.test(segment) && segment.length >= 2 + 64;
}

function isBlockOrStateId(segment: string): boolean {
  return isNumeric(segment) || isRootHex(segment) || NAMED_IDS.has(segment);
}

function isValidatorId(segment: string): boolean {
  return isNumeric(segment) || (HEX.test(segment) && segment.length > 2);
}

function after(...literals: string[]): (prev?: string) => boolean {
  const set = new Set(literals);
  return (prev) => prev !== undefined && set.has(prev);
}

const afterBlockList = after('blocks', 'blinded_blocks', 'blob_sidecars', 'headers');
const afterEpochList = after('duties', 'attester', 'proposer', 'sync', 'liveness', 'attestations');

/**
 * Contextual rules, most specific first
 */
export const PATH_RULES: readonly PathRule[] = [
  {
    name: 'validator-block-slot',
    matches: ({ prev1, prev2 }) => prev2 === 'validator' && after('blocks', 'blinded_blocks')(prev1),
    template: '{slot}',
  },
  {
    name: 'block-id',
    matches: ({ segment, prev1 }) => afterBlockList(prev1) && isBlockOrStateId(segment),
    template: '{block_id}',
  },
  {
    name: 'state-id',
    matches: ({ segment, prev1 }) => prev1 === 'states' && isBlockOrStateId(segment),
    template: '{state_id}',
  },
  {
    name: 'validator-id',
    matches: ({ segment, prev1 }) => prev1 === 'validators' && isValidatorId(segment),
    template: '{validator_id}',
  },
  {
    name: 'epoch',
    matches: ({ segment, prev1 }) => afterEpochList(prev1) && isNumeric(segment),
    template: '{epoch}',
  },
  {
    name: 'committee-index',
    matches: ({ segment, prev1 }) => prev1 === 'committees' && isNumeric(segment),
    template: '{committee_index}',
  },
  {
    name: 'peer-id',
    matches: ({ prev1 }) => prev1 === 'peers',
    template: '{peer_id}',
  },
  {
    name: 'bootstrap-root',
    matches: ({ segment, prev1 }) => prev1 === 'bootstrap' && isRootHex(segment),
    template: '{block_root}',
  },
];

/**
 * Rules applied when no contextual rule matched
 */
export const GENERIC_RULES: readonly PathRule[] = [
  { name: 'numeric-id', matches: ({ segment }) => isNumeric(segment), template: '{id}' },
  { name: 'root-hex', matches: ({ segment }) => isRootHex(segment), template: '{root}' },
];

function stripQueryAndFragment(path: string): string {
  const cut = path.search(/[?#]/);
  return cut === -1 ? path : path.slice(0, cut);
}

function toPathname(target: string): string {
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(target)) {
    return new URL(target).pathname;
  }
  return stripQueryAndFragment(target);
}

export class PathClassifier {
  private readonly rules: readonly PathRule[];

  constructor(rules: readonly PathRule[] = PATH_RULES, generic: readonly PathRule[] = GENERIC_RULES) {
    this.rules = [...rules, ...generic];
  }

  /**
   * Template for a path or absolute URL, undefined when it cannot be parsed
   */
  classify(target: string): string | undefined {
    try {
      if (typeof target !== 'string' || target.length === 0) return undefined;

      const pathname = toPathname(target);
      if (!pathname.startsWith('/')) return undefined;

      const segments = pathname.split('/').map((s) => decodeURIComponent(s));
      const out = segments.map((segment, i) => this.classifySegment({
        segment,
        prev1: i >= 1 ? segments[i - 1] : undefined,
        prev2: i >= 2 ? segments[i - 2] : undefined,
      }));
      return out.join('/');
    } catch {
      return undefined;
    }
  }

  private classifySegment(ctx: SegmentContext): string {
    if (ctx.segment === '' || TEMPLATE.test(ctx.segment)) {
      return ctx.segment;
    }
    const rule = this.rules.find((r) => r.matches(ctx));
    return rule ? rule.template : ctx.segment;
  }
}

const defaultClassifier = new PathClassifier();

/**
 * Classifies with the default Beacon API rule set
 */
export function classifyPath(target: string): string | undefined {
  return defaultClassifier.classify(target);
}
