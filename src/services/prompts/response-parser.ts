import { logger } from '@/utils/logger';

const FENCED_BLOCK = /```(?:markdown)?[^\S\n]*\n([\s\S]*)```/;

/**
 * First non-empty line of the response with double quotes removed
 */
export function parseTitle(response: string): string {
  const line = response
    .replaceAll('"', '')
    .split('\n')
    .map((candidate) => candidate.trim())
    .find((candidate) => candidate.length > 0);
  return line ?? '';
}

/**
 * Markdown between the first opening fence and the last closing fence,
 * or the whole response when it has no fence
 */
export function parseBody(response: string): string {
  const fenced = FENCED_BLOCK.exec(response);
  if (fenced?.[1] !== undefined) {
    logger.debug('Found fenced markdown in response');
    return fenced[1].trim();
  }
  logger.debug('No fenced markdown in response, using it as is');
  return response.trim();
}
