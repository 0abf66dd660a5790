export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export const HTTP_METHODS = ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}
