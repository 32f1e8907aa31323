/**
 * Errors raised by the card pipeline. `userMessage` is the reply text the
 * user sees; `message` is for the logs.
 */
export class CardBotError extends Error {
  constructor(
    message: string,
    readonly userMessage: string,
    readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class CardExtractionError extends CardBotError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(
      message,
      '📷 Could not read this image.\n\nPlease retake the photo with the card flat, in focus and well lit.',
      details
    );
  }
}

export class MediaDownloadError extends CardBotError {
  constructor(mediaId: string, status?: number) {
    super(
      `Failed to download media ${mediaId}${status ? ` (HTTP ${status})` : ''}`,
      '❌ Could not download your image, please send it again.',
      { mediaId, status }
    );
  }
}

export class InvalidImageError extends CardBotError {
  constructor(reason: string, maxBytes: number) {
    super(
      `Rejected image: ${reason}`,
      `❌ Unsupported image.\nPlease send a JPG or PNG photo under ${Math.floor(maxBytes / (1024 * 1024))} MB.`,
      { reason }
    );
  }
}

/**
 * Reply text for any error thrown while handling a message
 */
export const getUserFriendlyMessage = (error: unknown): string => {
  if (error instanceof CardBotError) {
    return error.userMessage;
  }
  return '❌ Sorry, something went wrong while processing your message. Please try again.';
};
