/**
 * Conversation persistence
 * One JSON document per session, expired after a configurable number of days
 */

import { mkdir, readFile, unlink, writeFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { SessionStoreError, describeError } from '../errors.js';
import { logger } from '../logger.js';
import { normalizeRole, type ChatMessage } from '../pipeline/state.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

const ChatMessageSchema = z.object({
    role: z.string().transform(normalizeRole),
    content: z.string(),
    timestamp: z.string(),
});

const SessionRecordSchema = z.object({
    sessionId: z.string(),
    messages: z.array(ChatMessageSchema),
    lastUpdated: z.string(),
    expiresAt: z.string(),
});

export type SessionRecord = z.infer<typeof SessionRecordSchema>;

export interface SessionStore {
    /** Resolves to null for unknown or expired sessions */
    load(sessionId: string): Promise<SessionRecord | null>;
    save(sessionId: string, messages: ChatMessage[]): Promise<SessionRecord>;
    /** Resolves to false when there was nothing to delete */
    delete(sessionId: string): Promise<boolean>;
}

export function assertSessionId(sessionId: string): void {
    if (!SESSION_ID_PATTERN.test(sessionId)) {
        throw new SessionStoreError(sessionId, `Invalid session id: "${sessionId}"`);
    }
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function isExpired(record: SessionRecord, now: Date): boolean {
    const expiresAt = Date.parse(record.expiresAt);
    return Number.isFinite(expiresAt) && expiresAt <= now.getTime();
}

function newRecord(sessionId: string, messages: ChatMessage[], ttlDays: number, now: Date): SessionRecord {
    return {
        sessionId,
        messages: [...messages],
        lastUpdated: now.toISOString(),
        expiresAt: new Date(now.getTime() + ttlDays * DAY_MS).toISOString(),
    };
}

export interface FileSessionStoreOptions {
    directory: string;
    ttlDays: number;
    now?: () => Date;
}

export class FileSessionStore implements SessionStore {
    private directory: string;
    private ttlDays: number;
    private now: () => Date;

    constructor(options: FileSessionStoreOptions) {
        this.directory = options.directory;
        this.ttlDays = options.ttlDays;
        this.now = options.now ?? (() => new Date());
    }

    private fileFor(sessionId: string): string {
        assertSessionId(sessionId);
        return path.join(this.directory, `${sessionId}.json`);
    }

    async load(sessionId: string): Promise<SessionRecord | null> {
        const file = this.fileFor(sessionId);

        let raw: string;
        try {
            raw = await readFile(file, 'utf8');
        } catch (error) {
            if (isNotFound(error)) return null;
            throw new SessionStoreError(sessionId, `Could not read session: ${describeError(error)}`);
        }

        let record: SessionRecord;
        try {
            record = SessionRecordSchema.parse(JSON.parse(raw));
        } catch (error) {
            throw new SessionStoreError(sessionId, `Session file is corrupt: ${describeError(error)}`);
        }

        if (isExpired(record, this.now())) {
            logger.info(`Session ${sessionId} expired, removing it`);
            await this.delete(sessionId);
            return null;
        }
        return record;
    }

    async save(sessionId: string, messages: ChatMessage[]): Promise<SessionRecord> {
        const file = this.fileFor(sessionId);
        const record = newRecord(sessionId, messages, this.ttlDays, this.now());
        try {
            await mkdir(this.directory, { recursive: true });
            await writeFile(file, JSON.stringify(record, null, 2), 'utf-8');
        } catch (error) {
            throw new SessionStoreError(sessionId, `Could not write session: ${describeError(error)}`);
        }
        return record;
    }

    async delete(sessionId: string): Promise<boolean> {
        const file = this.fileFor(sessionId);
        try {
            await unlink(file);
            return true;
        } catch (error) {
            if (isNotFound(error)) return false;
            throw new SessionStoreError(sessionId, `Could not delete session: ${describeError(error)}`);
        }
    }
}

export class MemorySessionStore implements SessionStore {
    private records = new Map<string, SessionRecord>();

    constructor(
        private ttlDays: number = 30,
        private now: () => Date = () => new Date()
    ) { }

    async load(sessionId: string): Promise<SessionRecord | null> {
        const record = this.records.get(sessionId);
        if (!record) return null;
        if (isExpired(record, this.now())) {
            this.records.delete(sessionId);
            return null;
        }
        return { ...record, messages: [...record.messages] };
    }

    async save(sessionId: string, messages: ChatMessage[]): Promise<SessionRecord> {
        assertSessionId(sessionId);
        const record = newRecord(sessionId, messages, this.ttlDays, this.now());
        this.records.set(sessionId, record);
        return record;
    }

    async delete(sessionId: string): Promise<boolean> {
        return this.records.delete(sessionId);
    }
}
