import { createHash } from 'node:crypto';

export const hashString = (input: string | Buffer) => createHash('sha256').update(input).digest('hex');
export const shortHash  = (input: string | Buffer, length = 12) => hashString(input).slice(0, length);
