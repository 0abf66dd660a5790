export interface FailureNotification {
  subject: string;
  body: string;
}

export function buildFailureNotification(
  monitor: string,
  failureCount: number,
  environment?: string,
  diagnostic?: string,
): FailureNotification {
  const title = `Monitor failure: ${monitor}`;
  const subject = environment === undefined ? title : `[${environment.toUpperCase()}] ${title}`;
  const summary = `${title}. Failure count: ${failureCount}`;

  return {
    subject,
    body: diagnostic === undefined ? summary : `${summary}\n${diagnostic}`,
  };
}
