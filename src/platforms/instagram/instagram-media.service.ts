import { Injectable } from '@nestjs/common';
import { ContentItem, MediaRef, PostReference } from '../../common/interfaces';
import { MediaGate } from '../../media/media-gate.service';
import { DEFAULT_INSTAGRAM_CONFIG } from './interfaces';

/**
 * Instagram Media Service
 * Picks the media and builds the caption for Instagram posts
 */
@Injectable()
export class InstagramMediaService {
  private readonly config = DEFAULT_INSTAGRAM_CONFIG;

  constructor(private readonly mediaGate: MediaGate) {}

  /**
   * First qualifying image, else first qualifying video
   */
  primaryMedia(item: ContentItem): MediaRef | undefined {
    const media = this.mediaGate.qualifyingMedia(item);
    return media.find((ref) => ref.kind === 'image') ?? media[0];
  }

  linkBackLine(parentReference: PostReference): string {
    return `Read more: ${parentReference.url}`;
  }

  /**
   * Title and body, shortened so the link-back line always fits
   */
  buildCaption(item: ContentItem, parentReference: PostReference): string {
    const linkBack = this.linkBackLine(parentReference);
    const text = [item.title, item.bodyText]
      .filter((part) => part.length > 0)
      .join('\n\n');

    const room = this.config.maxCaptionLength - linkBack.length - 2;
    return `${this.truncateCaption(text, room)}\n\n${linkBack}`;
  }

  /**
   * Truncate caption if necessary
   */
  truncateCaption(
    caption: string,
    maxLength: number = this.config.maxCaptionLength,
  ): string {
    if (caption.length <= maxLength) {
      return caption;
    }

    const truncated = caption.substring(0, Math.max(0, maxLength - 3));

    // Try to break at a word boundary
    const lastSpace = truncated.lastIndexOf(' ');
    if (lastSpace > maxLength - 100) {
      return truncated.substring(0, lastSpace) + '...';
    }

    return truncated + '...';
  }
}
