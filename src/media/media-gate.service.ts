import { Injectable } from '@nestjs/common';
import { ContentItem, MediaRef, Platform } from '../common/interfaces';

const isResolvableUrl = (url: string): boolean => {
  try {
    const parsed = new URL(url);
    return (
      (parsed.protocol === 'http:' || parsed.protocol === 'https:') &&
      parsed.hostname.length > 0
    );
  } catch {
    return false;
  }
};

/**
 * Media Gate
 * Pure checks on the media an item carries. URLs are checked for shape
 * only; reachability is left to the platform, which reports media-rejected.
 */
@Injectable()
export class MediaGate {
  qualifyingMedia(item: ContentItem): MediaRef[] {
    return item.mediaRefs.filter(
      (ref) =>
        (ref.kind === 'image' || ref.kind === 'video') &&
        isResolvableUrl(ref.url),
    );
  }

  hasQualifyingMedia(item: ContentItem): boolean {
    return this.qualifyingMedia(item).length > 0;
  }

  /**
   * Facebook takes text-only posts; Instagram needs an image or a video
   */
  isEligible(item: ContentItem, platform: Platform): boolean {
    switch (platform) {
      case Platform.FACEBOOK:
        return true;
      case Platform.INSTAGRAM:
        return this.hasQualifyingMedia(item);
      default: {
        const _exhaustiveCheck: never = platform;
        return _exhaustiveCheck;
      }
    }
  }
}
