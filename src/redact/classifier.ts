/**
 * Secret classifier: decides whether a piece of text carries a credential.
 *
 * Classification is all-or-nothing. Text that matches any pattern is
 * replaced as a whole by the sentinel; nothing is masked in place.
 */

export const SECRET_SENTINEL = "<SECRET REDACTED>";

export interface SecretPattern {
  type: string;
  pattern: RegExp;
}

/** Maps text to itself or to the sentinel. */
export type Classifier = (text: string) => string;

export const DEFAULT_SECRET_PATTERNS: readonly SecretPattern[] = [
  // Cloud providers
  { type: "aws_access_key", pattern: /\b(?:AKIA|ASIA)[0-9A-Z]{16}\b/ },
  { type: "aws_secret", pattern: /(?:aws_secret_access_key|secret_access_key)\s*[=:]\s*["']?[a-zA-Z0-9/+=]{40}/i },
  { type: "google_api_key", pattern: /AIza[a-zA-Z0-9_-]{35}/ },
  { type: "azure_storage_key", pattern: /AccountKey=[a-zA-Z0-9+/=]{86,88}/ },

  // Model and SaaS API keys
  { type: "anthropic_key", pattern: /sk-ant-[a-zA-Z0-9-]{20,}/ },
  { type: "openai_key", pattern: /sk-(?:proj-)?[a-zA-Z0-9]{20,}/ },
  { type: "stripe_key", pattern: /(?:sk|pk|rk)_(?:live|test)_[a-zA-Z0-9]{20,}/ },
  { type: "stripe_webhook_secret", pattern: /whsec_[a-zA-Z0-9]{20,}/ },
  { type: "sendgrid_key", pattern: /SG\.[a-zA-Z0-9_-]{22}\.[a-zA-Z0-9_-]{43}/ },
  { type: "twilio_key", pattern: /\bSK[a-f0-9]{32}\b/ },
  { type: "mailchimp_key", pattern: /\b[a-f0-9]{32}-us\d{1,2}\b/ },
  { type: "square_oauth", pattern: /sq0csp-[0-9A-Za-z\\\-_]{43}/ },

  // Source hosting and package registries
  { type: "github_token", pattern: /\bgh[pousr]_[a-zA-Z0-9]{36}\b/ },
  { type: "github_fine_grained", pattern: /github_pat_[a-zA-Z0-9_]{22,}/ },
  { type: "npm_token", pattern: /\bnpm_[a-zA-Z0-9]{36}\b/ },
  { type: "artifactory_token", pattern: /\bAKC[a-zA-Z0-9]{10,}/ },

  // Chat platforms
  { type: "slack_token", pattern: /xox[baprs]-[a-zA-Z0-9-]{10,}/ },
  { type: "slack_webhook", pattern: /hooks\.slack\.com\/services\/T[a-zA-Z0-9_]+\/B[a-zA-Z0-9_]+\/[a-zA-Z0-9_]+/ },
  { type: "discord_token", pattern: /[MN][A-Za-z\d]{23,}\.[\w-]{6}\.[\w-]{27}/ },

  // Key material and tokens
  { type: "private_key", pattern: /-----BEGIN (?:[A-Z]+ )?PRIVATE KEY-----/ },
  { type: "jwt", pattern: /eyJ[a-zA-Z0-9_-]{8,}\.eyJ[a-zA-Z0-9_-]{8,}\.[a-zA-Z0-9_-]+/ },
  { type: "bearer_token", pattern: /Bearer [a-zA-Z0-9\-_.~+/]{20,}=*/ },

  // Credentials in URLs
  { type: "basic_auth_url", pattern: /[a-z][a-z0-9+.-]*:\/\/[^\s:/@]+:[^\s:/@]+@[^\s]+/i },

  // Keyword assignments
  {
    type: "keyword_token",
    pattern: /(?:api[_-]?key|apikey|secret[_-]?key|access[_-]?token|auth[_-]?token|client[_-]?secret)\s*[=:]\s*["']?[a-zA-Z0-9\-_.]{16,}/i,
  },
  { type: "password", pattern: /(?:password|passwd|pwd)\s*[=:]\s*["']?[^\s"']{6,}/i },
];

/**
 * Names of the patterns that match somewhere in the text.
 */
export function detectSecrets(
  text: string,
  patterns: readonly SecretPattern[] = DEFAULT_SECRET_PATTERNS,
): string[] {
  if (!text) return [];
  return patterns.filter((p) => p.pattern.test(text)).map((p) => p.type);
}

export function containsSecret(
  text: string,
  patterns: readonly SecretPattern[] = DEFAULT_SECRET_PATTERNS,
): boolean {
  return !!text && patterns.some((p) => p.pattern.test(text));
}

/**
 * Return the text unchanged, or the sentinel if it holds a secret.
 */
export function classify(text: string): string {
  return containsSecret(text) ? SECRET_SENTINEL : text;
}

export function createClassifier(patterns: readonly SecretPattern[]): Classifier {
  return (text) => (containsSecret(text, patterns) ? SECRET_SENTINEL : text);
}
