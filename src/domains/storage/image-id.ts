import { v4 as uuidv4 } from 'uuid';

/** 32 lowercase hex characters; unique per capture. */
export function generateImageId(): string {
  return uuidv4().replace(/-/g, '');
}
