export interface LanguageToolConfig {
  baseUrl: string;
  language: string;
  timeoutMs: number;
  maxRequestsPerMinute: number;
}

export const languageToolConfig: LanguageToolConfig = {
  baseUrl: process.env.LANGUAGETOOL_URL || 'http://localhost:8081',
  language: process.env.LANGUAGETOOL_LANGUAGE || 'en-US',
  timeoutMs: parseInt(process.env.LANGUAGETOOL_TIMEOUT_MS || '15000', 10),
  maxRequestsPerMinute: parseInt(process.env.LANGUAGETOOL_MAX_REQUESTS_PER_MINUTE || '120', 10),
};

export function isPublicLanguageTool(baseUrl: string = languageToolConfig.baseUrl): boolean {
  return /^https:\/\/api\.languagetool\.org/i.test(baseUrl);
}
