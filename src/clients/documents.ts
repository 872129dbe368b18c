/**
 * Source document links
 * Pre-signed S3 URLs for cited documents, anchored to the cited page
 */

import { GetObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { describeError } from '../errors.js';
import { logger } from '../logger.js';
import type { DocumentLinker } from '../pipeline/collaborators.js';

export type PresignFn = (key: string, expiresInSeconds: number) => Promise<string>;

export interface S3DocumentLinkerOptions {
    bucket: string;
    region: string;
    expiresInSeconds: number;
    /** Replaces S3 signing, mainly for tests */
    sign?: PresignFn;
}

export function withPageAnchor(url: string, page: number | null): string {
    return page !== null && page > 0 ? `${url}#page=${page}` : url;
}

export class S3DocumentLinker implements DocumentLinker {
    private sign: PresignFn;
    private expiresInSeconds: number;

    constructor(options: S3DocumentLinkerOptions) {
        this.expiresInSeconds = options.expiresInSeconds;
        if (options.sign) {
            this.sign = options.sign;
        } else {
            const client = new S3Client({ region: options.region });
            this.sign = (key, expiresIn) =>
                getSignedUrl(client, new GetObjectCommand({ Bucket: options.bucket, Key: key }), { expiresIn });
        }
    }

    async linkFor(source: string, page: number | null): Promise<string | null> {
        if (!source) return null;
        try {
            const url = await this.sign(source, this.expiresInSeconds);
            return withPageAnchor(url, page);
        } catch (error) {
            logger.warn(`Failed to sign document URL for ${source}: ${describeError(error)}`);
            return null;
        }
    }
}
