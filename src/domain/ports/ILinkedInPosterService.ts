/**
 * ILinkedInPosterService Port
 *
 * Publishes a post to LinkedIn. Not idempotent: every successful call
 * creates a new remote post, so callers must invoke it at most once per record.
 */

export type LinkedInMediaKind = 'image' | 'video';

/**
 * Asset registered with LinkedIn and uploaded successfully.
 */
export interface UploadedAsset {
    /** Local path or URI the bytes came from */
    source: string;
    /** Asset URN returned by registerUpload */
    assetUrn: string;
    kind: LinkedInMediaKind;
}

export interface ILinkedInPosterService {
    /**
     * Publishes `content` with whichever attachments upload successfully.
     * Falls back to a text-only post when none do.
     * @returns provider-assigned post id
     * @throws PublishError when LinkedIn rejects the post itself
     */
    publish(content: string, attachments: string[]): Promise<string>;
}
