import { extractJsonObject, isRecord, round2 } from '../../common/text.util';
import type { MemoryType } from '../../memory/memory.types';

export interface ExtractedMemory {
  content: string;
  importance: number;
  type: MemoryType;
  tags: string[];
  /** Names, places and quoted terms found in the content. */
  entities?: string[];
}

const MEMORY_TYPES: readonly MemoryType[] = [
  'fact',
  'preference',
  'event',
  'relationship',
  'other',
];

function isMemoryType(value: unknown): value is MemoryType {
  return MEMORY_TYPES.some((type) => type === value);
}

/**
 * Parses the extraction model's reply. Invalid entries are dropped;
 * throws SyntaxError when the reply holds no `memories` array.
 */
export function parseExtraction(raw: string): ExtractedMemory[] {
  const json = extractJsonObject(raw);
  const items = json['memories'];
  if (!Array.isArray(items)) {
    throw new SyntaxError('Extraction reply has no "memories" array');
  }

  const memories: ExtractedMemory[] = [];
  for (const item of items) {
    if (!isRecord(item)) continue;
    const { content, importance, type, tags } = item;
    const text = typeof content === 'string' ? content.trim() : '';
    if (!text) continue;

    memories.push({
      content: text,
      importance:
        typeof importance === 'number' && Number.isFinite(importance)
          ? Math.min(1, Math.max(0, importance))
          : 0.5,
      type: isMemoryType(type) ? type : 'other',
      tags: Array.isArray(tags)
        ? tags.filter((t): t is string => typeof t === 'string')
        : [],
    });
  }
  return memories;
}

// Stops a captured phrase at punctuation or at a following clause
const PHRASE = String.raw`([^,.;!?]+?)(?=\s+(?:and|but)\b|[,.;!?]|$)`;

interface StatementPattern {
  regex: RegExp;
  toMemory: (match: RegExpExecArray) => ExtractedMemory;
}

const verbForm = (verb: string) => `${verb.toLowerCase()}s`;

const STATEMENT_PATTERNS: StatementPattern[] = [
  {
    regex: /\b[Mm]y name is ([A-Z][a-z'-]+(?:\s[A-Z][a-z'-]+)?)/,
    toMemory: (m) => ({
      content: `User's name is ${m[1]}`,
      importance: 0.8,
      type: 'fact',
      tags: ['name'],
    }),
  },
  {
    regex: new RegExp(String.raw`\bI live in ${PHRASE}`),
    toMemory: (m) => ({
      content: `User lives in ${m[1]}`,
      importance: 0.7,
      type: 'fact',
      tags: ['location'],
    }),
  },
  {
    regex: new RegExp(String.raw`\bI work (at|for|as) ${PHRASE}`),
    toMemory: (m) => ({
      content: `User works ${m[1]} ${m[2]}`,
      importance: 0.7,
      type: 'fact',
      tags: ['work'],
    }),
  },
  {
    regex: new RegExp(String.raw`\bI (like|love|enjoy) ${PHRASE}`),
    toMemory: (m) => ({
      content: `User ${verbForm(m[1])} ${m[2]}`,
      importance: 0.6,
      type: 'preference',
      tags: ['likes'],
    }),
  },
  {
    regex: new RegExp(String.raw`\bI prefer ${PHRASE}`),
    toMemory: (m) => ({
      content: `User prefers ${m[1]}`,
      importance: 0.6,
      type: 'preference',
      tags: ['preference'],
    }),
  },
  {
    regex: new RegExp(String.raw`\bI (hate|dislike) ${PHRASE}`),
    toMemory: (m) => ({
      content: `User ${verbForm(m[1])} ${m[2]}`,
      importance: 0.6,
      type: 'preference',
      tags: ['dislikes'],
    }),
  },
];

/** Keyword fallback used when the extraction model is unavailable. */
export function extractByPattern(message: string): ExtractedMemory[] {
  const memories: ExtractedMemory[] = [];
  for (const pattern of STATEMENT_PATTERNS) {
    const match = pattern.regex.exec(message);
    if (match) memories.push(pattern.toMemory(match));
  }
  return memories;
}

const DEFAULT_IMPORTANCE = 0.5;

const TYPE_IMPORTANCE: Readonly<Record<MemoryType, number>> = {
  relationship: 0.8,
  preference: 0.7,
  fact: 0.6,
  event: 0.6,
  other: 0.5,
};

const EMPHASIS = /\b(?:prefer|like|dislike|love|hate|important|always|never)/i;

// Checked in order; the first match wins
const CATEGORY_CUES: readonly [MemoryType, RegExp][] = [
  ['preference', /\b(?:prefer|like|dislike|love|hate|favou?rite|opinion)/i],
  ['event', /\b(?:event|happened|occurred|date|time|when)\b/i],
  ['relationship', /\b(?:friend|family|colleague|knows|met|relationship)/i],
  ['fact', /\b(?:is|has|works|lives|from)\b/i],
];

const TAG_STOP_WORDS = new Set([
  'user',
  'that',
  'this',
  'with',
  'from',
  'have',
  'been',
  'will',
  'would',
  'could',
  'should',
]);

const ENTITY_STOP_WORDS = new Set([
  'The',
  'This',
  'That',
  'These',
  'Those',
  'You',
  'He',
  'She',
  'It',
  'We',
  'They',
  'User',
]);

const MAX_TAGS = 5;
const MAX_MERGED_TAGS = 10;
const MAX_ENTITIES = 10;

export function categorizeMemory(content: string): MemoryType {
  return CATEGORY_CUES.find(([, cue]) => cue.test(content))?.[0] ?? 'other';
}

export function calculateImportance(content: string, type: MemoryType): number {
  let score = TYPE_IMPORTANCE[type];
  if (EMPHASIS.test(content)) score += 0.2;
  if (content.length > 100) score += 0.1;
  return round2(Math.min(1, score));
}

export function generateTags(content: string, type: MemoryType): string[] {
  const keywords = (content.toLowerCase().match(/\b[a-z]{4,}\b/g) ?? []).filter(
    (word) => !TAG_STOP_WORDS.has(word),
  );
  return [...new Set([type, ...keywords])].slice(0, MAX_TAGS);
}

export function extractEntities(content: string): string[] {
  const capitalized = content.match(/\b[A-Z][a-z]+\b/g) ?? [];
  const quoted = [...content.matchAll(/"([^"]+)"/g)].map((m) => m[1]);
  return [...new Set([...capitalized, ...quoted])]
    .filter((entity) => !ENTITY_STOP_WORDS.has(entity))
    .slice(0, MAX_ENTITIES);
}

/**
 * Fills in what the extractor left at its defaults: the type of `other`
 * memories, the importance of unscored ones, tags and entities.
 */
export function enrichMemory(memory: ExtractedMemory): ExtractedMemory {
  const type =
    memory.type === 'other' ? categorizeMemory(memory.content) : memory.type;
  const importance =
    memory.importance === DEFAULT_IMPORTANCE
      ? calculateImportance(memory.content, type)
      : memory.importance;
  const tags =
    memory.tags.length < 2
      ? [...new Set([...memory.tags, ...generateTags(memory.content, type)])].slice(
          0,
          MAX_TAGS,
        )
      : memory.tags;
  const entities = extractEntities(memory.content);

  return {
    content: memory.content,
    importance,
    type,
    tags,
    ...(entities.length > 0 ? { entities } : {}),
  };
}

function wordSet(text: string): Set<string> {
  return new Set(text.toLowerCase().match(/\w+/g) ?? []);
}

/** Same type and more than half of the larger word set shared. */
export function areSimilar(a: ExtractedMemory, b: ExtractedMemory): boolean {
  if (a.type !== b.type) return false;
  const wordsA = wordSet(a.content);
  const wordsB = wordSet(b.content);
  if (wordsA.size === 0 || wordsB.size === 0) return false;
  const shared = [...wordsA].filter((word) => wordsB.has(word)).length;
  return shared / Math.max(wordsA.size, wordsB.size) > 0.5;
}

export function mergeMemories(group: ExtractedMemory[]): ExtractedMemory {
  const longest = group.reduce((best, m) =>
    m.content.length > best.content.length ? m : best,
  );
  const entities = [...new Set(group.flatMap((m) => m.entities ?? []))].slice(
    0,
    MAX_ENTITIES,
  );
  return {
    content: longest.content,
    type: longest.type,
    importance: Math.max(...group.map((m) => m.importance)),
    tags: [...new Set(group.flatMap((m) => m.tags))].slice(0, MAX_MERGED_TAGS),
    ...(entities.length > 0 ? { entities } : {}),
  };
}

/** Merges each memory with the later ones it is similar to; order is kept. */
export function consolidateMemories(memories: ExtractedMemory[]): ExtractedMemory[] {
  const merged = new Set<number>();
  const result: ExtractedMemory[] = [];

  memories.forEach((memory, i) => {
    if (merged.has(i)) return;
    const group = [memory];
    for (let j = i + 1; j < memories.length; j++) {
      if (!merged.has(j) && areSimilar(memory, memories[j])) {
        group.push(memories[j]);
        merged.add(j);
      }
    }
    result.push(group.length > 1 ? mergeMemories(group) : memory);
  });
  return result;
}
