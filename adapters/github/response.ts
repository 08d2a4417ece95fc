import { describeGitHubError } from '@common/schemas.js';

//NOTE: Error bodies are usually JSON but proxies can answer with HTML (e.g. a 502 page)
export async function readErrorMessage(response: Response, fallback: string): Promise<string> {
  const text = await response.text();
  let body: unknown = text;
  try {
    body = JSON.parse(text);
  } catch {
    return text.trim() ? `${fallback}: ${text.trim().slice(0, 200)}` : fallback;
  }
  return describeGitHubError(body, fallback);
}
