const SENSITIVE_PATTERNS = [
  /sk-ant-[a-zA-Z0-9_-]{20,}/g, // Anthropic API keys
  /sk-[a-zA-Z0-9]{32,}/g, // OpenAI API keys
  /gh[pousr]_[a-zA-Z0-9]{36,}/g, // GitHub tokens
  /AKIA[0-9A-Z]{16}/g, // AWS access key ids
  /\b[a-f0-9]{64}\b/g, // 64-char hex tokens
  /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g,
];

/** Strip credential-looking strings from tool output before it reaches the model. */
export function sanitizeToolOutput(text: string): string {
  let sanitized = text;
  for (const pattern of SENSITIVE_PATTERNS) {
    sanitized = sanitized.replace(pattern, '[REDACTED]');
  }
  return sanitized;
}

export function summarize(text: string, max = 200): string {
  return text.length > max ? text.slice(0, max) + '...' : text;
}
