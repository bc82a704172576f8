import lexicon from '../lexicon.json';

export type ViolationType =
  | 'email'
  | 'phone'
  | 'credit_card'
  | 'ssn'
  | 'address'
  | 'date_of_birth'
  | 'personal_name'
  | 'financial_info'
  | 'health_info';

export type Severity = 'low' | 'medium' | 'high';

export interface PrivacyViolation {
  type: ViolationType;
  severity: Severity;
  content: string;
  start: number;
  end: number;
}

export const SEVERITY: Record<ViolationType, Severity> = {
  email: 'low',
  phone: 'low',
  address: 'medium',
  date_of_birth: 'medium',
  personal_name: 'medium',
  credit_card: 'high',
  ssn: 'high',
  financial_info: 'high',
  health_info: 'high',
};

const REDACTION_LABEL: Record<ViolationType, string> = {
  email: '[EMAIL REDACTED]',
  phone: '[PHONE REDACTED]',
  credit_card: '[CARD REDACTED]',
  ssn: '[SSN REDACTED]',
  address: '[ADDRESS REDACTED]',
  date_of_birth: '[DOB REDACTED]',
  personal_name: '[NAME REDACTED]',
  financial_info: '[FINANCIAL INFO REDACTED]',
  health_info: '[HEALTH INFO REDACTED]',
};

const SEVERITY_RANK: Record<Severity, number> = { low: 0, medium: 1, high: 2 };

interface PiiPattern {
  type: ViolationType;
  regex: RegExp;
  /** Capture group holding the sensitive part; defaults to the whole match. */
  group?: number;
  validate?: (match: string) => boolean;
}

/** Luhn checksum over the digits of a card-like string. */
export function luhnCheck(digits: string): boolean {
  const stripped = digits.replace(/[\s.-]/g, '');
  if (!/^\d+$/.test(stripped) || stripped.length < 2) return false;

  let sum = 0;
  let alternate = false;
  for (let i = stripped.length - 1; i >= 0; i--) {
    let n = parseInt(stripped[i], 10);
    if (alternate) {
      n *= 2;
      if (n > 9) n -= 9;
    }
    sum += n;
    alternate = !alternate;
  }
  return sum % 10 === 0;
}

const nameStopWords = new Set(lexicon.nameStopWords);

const PATTERNS: PiiPattern[] = [
  {
    type: 'email',
    regex: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
  },
  {
    type: 'phone',
    regex: /(?:\+?\d{1,3}[-.\s]?)?\(?\b\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}\b/g,
  },
  {
    type: 'credit_card',
    regex: /\b\d{4}[-.\s]?\d{4}[-.\s]?\d{4}[-.\s]?\d{4}\b/g,
    validate: luhnCheck,
  },
  {
    type: 'ssn',
    regex: /\b\d{3}-\d{2}-\d{4}\b/g,
  },
  {
    type: 'address',
    regex:
      /\b\d+\s+[A-Za-z\s]+(?:Street|St|Avenue|Ave|Road|Rd|Drive|Dr|Lane|Ln|Boulevard|Blvd|Court|Ct|Place|Pl)\b[,\s]+[A-Za-z\s]+(?:,\s*)?[A-Z]{2}\s+\d{5}/gi,
  },
  {
    type: 'date_of_birth',
    regex:
      /\b(?:born(?: on)?|birth|dob|date of birth|birthday(?: is)?)[:\s]+(\d{1,2}[/-]\d{1,2}[/-]\d{2,4})\b/gi,
    group: 1,
  },
  {
    type: 'personal_name',
    regex: /\b[A-Z][a-z]+\s+[A-Z][a-z]+\b/g,
    validate: (match) =>
      !match
        .toLowerCase()
        .split(/\s+/)
        .some((word) => nameStopWords.has(word)),
  },
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const KEYWORD_PATTERNS: { type: ViolationType; regex: RegExp }[] = [
  ...lexicon.financialKeywords.map((keyword) => ({
    type: 'financial_info' as const,
    regex: new RegExp(`\\b${escapeRegExp(keyword)}\\b`, 'i'),
  })),
  ...lexicon.healthKeywords.map((keyword) => ({
    type: 'health_info' as const,
    regex: new RegExp(`\\b${escapeRegExp(keyword)}\\b`, 'i'),
  })),
];

/**
 * Scans a message for personal data. Overlapping findings are resolved in
 * favour of the higher severity, then the longer match; the result is ordered
 * by position.
 */
export function detectPii(text: string): PrivacyViolation[] {
  const candidates: PrivacyViolation[] = [];
  const push = (type: ViolationType, content: string, start: number) =>
    candidates.push({
      type,
      severity: SEVERITY[type],
      content,
      start,
      end: start + content.length,
    });

  for (const pattern of PATTERNS) {
    for (const match of text.matchAll(pattern.regex)) {
      const index = match.index ?? 0;
      const content = match[pattern.group ?? 0];
      if (pattern.validate && !pattern.validate(match[0])) continue;
      const start =
        pattern.group === undefined
          ? index
          : index + match[0].length - content.length;
      push(pattern.type, content, start);
    }
  }

  // One finding per keyword
  for (const { type, regex } of KEYWORD_PATTERNS) {
    const match = regex.exec(text);
    if (match) push(type, match[0], match.index);
  }

  const ranked = [...candidates].sort(
    (a, b) =>
      SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
      b.end - b.start - (a.end - a.start) ||
      a.start - b.start,
  );

  const accepted: PrivacyViolation[] = [];
  for (const candidate of ranked) {
    const overlaps = accepted.some(
      (v) => candidate.start < v.end && v.start < candidate.end,
    );
    if (!overlaps) accepted.push(candidate);
  }

  return accepted.sort((a, b) => a.start - b.start);
}

export function redact(text: string, violations: PrivacyViolation[]): string {
  let sanitized = text;
  for (const v of [...violations].sort((a, b) => b.start - a.start)) {
    sanitized =
      sanitized.slice(0, v.start) +
      REDACTION_LABEL[v.type] +
      sanitized.slice(v.end);
  }
  return sanitized;
}
