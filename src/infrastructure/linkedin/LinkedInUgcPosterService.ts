/**
 * LinkedInUgcPosterService
 *
 * Publishes member posts through LinkedIn's UGC API.
 * Media goes through registerUpload -> PUT bytes -> asset URN before the post is created.
 */

import axios from 'axios';
import fs from 'fs';
import path from 'path';
import { ILinkedInPosterService, LinkedInMediaKind, UploadedAsset } from '../../domain/ports/ILinkedInPosterService';
import { PublishError, describeError } from '../../domain/errors/PublishingErrors';

export const DEFAULT_LINKEDIN_API_BASE_URL = 'https://api.linkedin.com/v2';

const VIDEO_EXTENSIONS = ['.mp4', '.avi', '.mov'];
const UPLOAD_MECHANISM_KEY = 'com.linkedin.digitalmedia.uploading.MediaUploadHttpRequest';

export interface LinkedInUgcPosterOptions {
    apiBaseUrl?: string;
    /** Per-request timeout in milliseconds */
    timeoutMs?: number;
}

interface RegisterUploadResponse {
    value?: {
        asset?: string;
        uploadMechanism?: Record<string, { uploadUrl?: string } | undefined>;
    };
}

interface UgcShareMedia {
    status: 'READY';
    media: string;
}

interface UgcPostBody {
    author: string;
    lifecycleState: 'PUBLISHED';
    specificContent: {
        'com.linkedin.ugc.ShareContent': {
            shareCommentary: { text: string };
            shareMediaCategory: 'NONE' | 'IMAGE' | 'VIDEO';
            media?: UgcShareMedia[];
        };
    };
    visibility: { 'com.linkedin.ugc.MemberNetworkVisibility': 'PUBLIC' };
}

export class LinkedInUgcPosterService implements ILinkedInPosterService {
    private readonly accessToken: string;
    private readonly personUrn: string;
    private readonly apiBaseUrl: string;
    private readonly timeoutMs: number;

    constructor(accessToken: string, personUrn: string, options: LinkedInUgcPosterOptions = {}) {
        if (!accessToken.trim()) {
            throw new Error('LinkedIn access token is required');
        }
        if (!personUrn.trim()) {
            throw new Error('LinkedIn person URN is required');
        }
        this.accessToken = accessToken.trim();
        this.personUrn = personUrn.trim();
        this.apiBaseUrl = (options.apiBaseUrl ?? DEFAULT_LINKEDIN_API_BASE_URL).replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs ?? 30000;
    }

    /**
     * Looks up the member behind an access token via the OpenID userinfo endpoint.
     */
    static async resolvePersonUrn(
        accessToken: string,
        options: LinkedInUgcPosterOptions = {}
    ): Promise<string> {
        const baseUrl = (options.apiBaseUrl ?? DEFAULT_LINKEDIN_API_BASE_URL).replace(/\/+$/, '');
        try {
            const response = await axios.get<{ sub?: string }>(`${baseUrl}/userinfo`, {
                headers: { Authorization: `Bearer ${accessToken}` },
                timeout: options.timeoutMs ?? 30000,
            });
            const sub = response.data?.sub;
            if (!sub) {
                throw new PublishError('userinfo response did not include a member id', response.status);
            }
            return `urn:li:person:${sub}`;
        } catch (error) {
            throw toPublishError(error);
        }
    }

    async publish(content: string, attachments: string[]): Promise<string> {
        if (attachments.length === 0) {
            return this.createPost(content, []);
        }

        const assets: UploadedAsset[] = [];
        for (const source of attachments) {
            const asset = await this.uploadAttachment(source);
            if (asset) {
                assets.push(asset);
            }
        }

        if (assets.length === 0) {
            console.warn(`[LinkedIn] No attachment could be uploaded, publishing as text-only`);
        }
        return this.createPost(content, assets);
    }

    /**
     * Registers and uploads one attachment. Returns null (and logs) on any failure.
     */
    private async uploadAttachment(source: string): Promise<UploadedAsset | null> {
        try {
            const kind = mediaKindFor(source);
            const bytes = await this.readAttachment(source);
            if (!bytes) {
                console.warn(`[LinkedIn] Media file not found: ${source}`);
                return null;
            }

            console.log(`[LinkedIn] Uploading ${kind}: ${source}`);
            const { uploadUrl, assetUrn } = await this.registerUpload(kind);
            await axios.put(uploadUrl, bytes, {
                headers: {
                    Authorization: `Bearer ${this.accessToken}`,
                    'Content-Type': 'application/octet-stream',
                },
                timeout: this.timeoutMs,
                maxBodyLength: Infinity,
                maxContentLength: Infinity,
            });

            return { source, assetUrn, kind };
        } catch (error) {
            const reason = axios.isAxiosError(error) ? toPublishError(error).message : describeError(error);
            console.error(`[LinkedIn] Failed to upload ${source}: ${reason}`);
            return null;
        }
    }

    private async readAttachment(source: string): Promise<Buffer | null> {
        if (/^https?:\/\//i.test(source)) {
            const response = await axios.get<ArrayBuffer>(source, {
                responseType: 'arraybuffer',
                timeout: this.timeoutMs,
            });
            return Buffer.from(response.data);
        }

        if (!fs.existsSync(source)) {
            return null;
        }
        return fs.promises.readFile(source);
    }

    private async registerUpload(kind: LinkedInMediaKind): Promise<{ uploadUrl: string; assetUrn: string }> {
        const response = await axios.post<RegisterUploadResponse>(
            `${this.apiBaseUrl}/assets?action=registerUpload`,
            {
                registerUploadRequest: {
                    recipes: [`urn:li:digitalmediaRecipe:feedshare-${kind}`],
                    owner: this.personUrn,
                    serviceRelationships: [
                        {
                            relationshipType: 'OWNER',
                            identifier: 'urn:li:userGeneratedContent',
                        },
                    ],
                },
            },
            { headers: this.jsonHeaders(), timeout: this.timeoutMs }
        );

        const uploadUrl = response.data?.value?.uploadMechanism?.[UPLOAD_MECHANISM_KEY]?.uploadUrl;
        const assetUrn = response.data?.value?.asset;
        if (!uploadUrl || !assetUrn) {
            throw new PublishError('registerUpload response is missing uploadUrl or asset', response.status);
        }
        return { uploadUrl, assetUrn };
    }

    private async createPost(content: string, assets: UploadedAsset[]): Promise<string> {
        const body = this.buildPostBody(content, assets);

        try {
            const response = await axios.post<{ id?: string }>(`${this.apiBaseUrl}/ugcPosts`, body, {
                headers: this.jsonHeaders(),
                timeout: this.timeoutMs,
            });

            const headerId = response.headers['x-restli-id'];
            const postId = typeof headerId === 'string' && headerId ? headerId : response.data?.id ?? 'unknown';
            console.log(`[LinkedIn] Posted successfully: ${postId}`);
            return postId;
        } catch (error) {
            const publishError = toPublishError(error);
            console.error(`[LinkedIn] ${publishError.message}`);
            throw publishError;
        }
    }

    private buildPostBody(content: string, assets: UploadedAsset[]): UgcPostBody {
        const shareContent: UgcPostBody['specificContent']['com.linkedin.ugc.ShareContent'] = {
            shareCommentary: { text: content },
            shareMediaCategory: 'NONE',
        };

        if (assets.length > 0) {
            shareContent.shareMediaCategory = assets.every((asset) => asset.kind === 'video') ? 'VIDEO' : 'IMAGE';
            shareContent.media = assets.map((asset) => ({ status: 'READY', media: asset.assetUrn }));
        }

        return {
            author: this.personUrn,
            lifecycleState: 'PUBLISHED',
            specificContent: { 'com.linkedin.ugc.ShareContent': shareContent },
            visibility: { 'com.linkedin.ugc.MemberNetworkVisibility': 'PUBLIC' },
        };
    }

    private jsonHeaders(): Record<string, string> {
        return {
            Authorization: `Bearer ${this.accessToken}`,
            'X-Restli-Protocol-Version': '2.0.0',
            'Content-Type': 'application/json',
        };
    }
}

export function mediaKindFor(source: string): LinkedInMediaKind {
    const pathname = /^https?:\/\//i.test(source) ? new URL(source).pathname : source;
    return VIDEO_EXTENSIONS.includes(path.extname(pathname).toLowerCase()) ? 'video' : 'image';
}

function toPublishError(error: unknown): PublishError {
    if (error instanceof PublishError) {
        return error;
    }
    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        const message = extractProviderMessage(error.response?.data) ?? error.message;
        return new PublishError(message, status);
    }
    return new PublishError(describeError(error));
}

function extractProviderMessage(data: unknown): string | undefined {
    if (typeof data === 'string' && data.trim()) {
        return data.trim();
    }
    if (typeof data === 'object' && data !== null) {
        if ('message' in data && typeof data.message === 'string') {
            return data.message;
        }
        if ('error' in data && typeof data.error === 'string') {
            return data.error;
        }
    }
    return undefined;
}
