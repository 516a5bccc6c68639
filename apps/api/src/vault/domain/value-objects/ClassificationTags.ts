import { ForbiddenTagTypeError } from '../vault-errors';
import { hasLengthBetween, isAscii } from './ascii';

export const MAX_CLASSIFICATION_TAGS = 10;
export const CLASSIFICATION_TAG_MAX_LENGTH = 32;

/**
 * Ordered list of category labels attached to an entry.
 *
 * Holds 1-10 tags of 1-32 ASCII characters each. Order and duplicates are
 * kept exactly as supplied.
 */
export class ClassificationTags {
  private constructor(private readonly value: readonly string[]) {}

  static from(tags: readonly string[]): ClassificationTags {
    if (tags.length < 1 || tags.length > MAX_CLASSIFICATION_TAGS) {
      throw new ForbiddenTagTypeError(
        `Classification tags must contain 1-${MAX_CLASSIFICATION_TAGS} tags, got ${tags.length}`
      );
    }
    tags.forEach((tag, index) => {
      if (!hasLengthBetween(tag, 1, CLASSIFICATION_TAG_MAX_LENGTH)) {
        throw new ForbiddenTagTypeError(
          `Classification tag ${index} must be 1-${CLASSIFICATION_TAG_MAX_LENGTH} characters, got ${tag.length}`
        );
      }
      if (!isAscii(tag)) {
        throw new ForbiddenTagTypeError(`Classification tag ${index} must be ASCII without NUL`);
      }
    });
    return new ClassificationTags([...tags]);
  }

  unwrap(): string[] {
    return [...this.value];
  }

  equals(other: ClassificationTags): boolean {
    return (
      this.value.length === other.value.length &&
      this.value.every((tag, index) => tag === other.value[index])
    );
  }
}
