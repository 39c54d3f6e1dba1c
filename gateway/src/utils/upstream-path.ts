import { posix } from 'path';
import { PathRejectedError } from '../types';

const FORBIDDEN_RAW = /[?#\\\0]/;
const FORBIDDEN_DECODED = /[\/\\\0?#]/;

function reject(reason: string, logicalPath: string): never {
  throw new PathRejectedError(`Invalid path: ${reason}`, { path: logicalPath });
}

/**
 * Превращает логический путь (`portfolio/orders/abc`, в URL-кодировке)
 * в путь upstream под фиксированным префиксом: `/trade-api/v2/portfolio/orders/abc`.
 *
 * Сегменты `.` и `..`, обратные слэши, закодированные `/`, `?` и `#`
 * отклоняются; пустые сегменты схлопываются. Результат всегда лежит
 * внутри префикса.
 */
export function resolveUpstreamPath(apiPrefix: string, logicalPath: string): string {
  if (FORBIDDEN_RAW.test(logicalPath)) {
    reject('forbidden character', logicalPath);
  }

  const segments = logicalPath
    .split('/')
    .filter((segment) => segment !== '')
    .map((segment) => {
      let decoded: string;
      try {
        decoded = decodeURIComponent(segment);
      } catch {
        return reject('malformed percent-encoding', logicalPath);
      }

      if (decoded === '.' || decoded === '..') {
        reject('dot segments are not allowed', logicalPath);
      }
      if (FORBIDDEN_DECODED.test(decoded)) {
        reject('forbidden character in segment', logicalPath);
      }

      return encodeURIComponent(decoded);
    });

  if (segments.length === 0) {
    reject('path is empty', logicalPath);
  }

  const upstreamPath = `${apiPrefix}/${segments.join('/')}`;

  if (!upstreamPath.startsWith(`${apiPrefix}/`) || posix.normalize(upstreamPath) !== upstreamPath) {
    reject('path escapes the API prefix', logicalPath);
  }

  return upstreamPath;
}

export default resolveUpstreamPath;
