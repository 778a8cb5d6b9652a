import { Request } from 'express';
import { isDefined } from './isDefined';

export function describeRequest(request: Request, head: string): string {
  return [
    head,
    hasKeys(request.body) ? `body = ${JSON.stringify(request.body)}` : null,
    hasKeys(request.query) ? `query = ${JSON.stringify(request.query)}` : null,
  ]
    .filter(isDefined)
    .join(' ');
}

function hasKeys(value: unknown): boolean {
  return (
    typeof value === 'object' && value !== null && Object.keys(value).length > 0
  );
}
