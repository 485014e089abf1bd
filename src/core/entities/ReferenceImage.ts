import path from 'path';

export const MAX_REFERENCE_IMAGES = 5;

export type ReferenceMimeType = 'image/png' | 'image/jpeg';

/**
 * User-supplied image used to steer the style of every scene in a run
 */
export interface ReferenceImage {
  readonly data: Buffer;
  readonly mimeType: ReferenceMimeType;
  readonly description: string;
  readonly tags: readonly string[];
}

/**
 * 0 to MAX_REFERENCE_IMAGES references, owned by the run configuration
 */
export type ReferenceImageSet = readonly ReferenceImage[];

export function extensionForMimeType(mimeType: ReferenceMimeType): 'png' | 'jpg' {
  return mimeType === 'image/png' ? 'png' : 'jpg';
}

export function mimeTypeForPath(filePath: string): ReferenceMimeType | null {
  switch (path.extname(filePath).toLowerCase()) {
    case '.png':
      return 'image/png';
    case '.jpg':
    case '.jpeg':
      return 'image/jpeg';
    default:
      return null;
  }
}
