export interface MerchantRule {
  name: string;
  pattern: RegExp;
  replacement: string;
}

// Order matters: prefixes go before the punctuation pass strips the `*` they are anchored on.
export const MERCHANT_RULES: readonly MerchantRule[] = [
  { name: 'authorized-on', pattern: /\bpurchase\s+authori[sz]ed\s+on\s+\d{1,2}\/\d{1,2}\b/gi, replacement: ' ' },
  {
    name: 'processor-prefix',
    pattern:
      /^\s*(?:pos\s+purchase|pos\s+debit|pos|debit\s+card\s+purchase|debit\s+card|card\s+purchase|checkcard|check\s+card|visa\s+purchase|contactless|recurring\s+payment|ach\s+debit|ach\s+credit|ach)\b[\s:-]*/i,
    replacement: '',
  },
  { name: 'aggregator-prefix', pattern: /\b(?:sq|tst|sp|pp|paypal|pypl|ckc|dnh)\s?\*\s*/gi, replacement: ' ' },
  { name: 'card-suffix', pattern: /\b(?:card|crd)\s*(?:ending|no\.?|number|#)?\s*(?:in\s*)?[x*]*\d{4}\b/gi, replacement: ' ' },
  { name: 'masked-card', pattern: /[x*]{2,}\d{4}\b/gi, replacement: ' ' },
  {
    name: 'reference-number',
    pattern: /\b(?:ref(?:erence)?|trace|auth|conf|txn)\s*(?:no\.?|number|#|:)?\s*[:#]?\s*[a-z0-9-]*\d[a-z0-9-]*/gi,
    replacement: ' ',
  },
  { name: 'hash-number', pattern: /#\s*\d+/g, replacement: ' ' },
  { name: 'embedded-date', pattern: /\b\d{1,2}[/-]\d{1,2}(?:[/-]\d{2,4})?\b/g, replacement: ' ' },
  { name: 'long-digit-run', pattern: /\b\d{5,}\b/g, replacement: ' ' },
  { name: 'apostrophe', pattern: /['’]/g, replacement: '' },
  { name: 'punctuation', pattern: /[^\p{L}\p{N}&\s]/gu, replacement: ' ' },
  { name: 'whitespace', pattern: /\s+/g, replacement: ' ' },
];

const combiningMarks = /\p{M}/gu;
const repeatingWhitespace = /\s+/g;

export const normalizeMerchant = (input: string, rules: readonly MerchantRule[] = MERCHANT_RULES): string => {
  const folded = input.normalize('NFKD').replace(combiningMarks, '');
  const cleaned = rules.reduce((text, rule) => text.replace(rule.pattern, rule.replacement), folded).trim();

  if (cleaned) {
    return cleaned.toUpperCase();
  }

  const fallback = folded.replace(repeatingWhitespace, ' ').trim().toUpperCase();
  return fallback || 'UNKNOWN';
};
