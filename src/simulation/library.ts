import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

const topicSchema = z.object({
    id: z.string().regex(/^[a-z0-9_-]+$/),
    title: z.string().min(1),
    content: z.string(),
});

const libraryFileSchema = z.object({
    topics: z.array(topicSchema).min(1),
});

export type LibraryTopic = z.infer<typeof topicSchema>;

export const LIBRARY_PATH = path.resolve(__dirname, '../../data/library.json');

export function loadLibrary(filePath: string = LIBRARY_PATH): LibraryTopic[] {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    return libraryFileSchema.parse(raw).topics;
}

let topics: LibraryTopic[] | null = null;

const allTopics = (): LibraryTopic[] => {
    if (topics === null) {
        topics = loadLibrary();
    }
    return topics;
};

/** Topic ids and titles, in file order. */
export const topicList = (): { id: string; title: string }[] => allTopics().map(({ id, title }) => ({ id, title }));

export const getTopic = (id: string): LibraryTopic | undefined => allTopics().find((t) => t.id === id.toLowerCase());

/** Case-insensitive substring match on id, title or content. */
export const searchTopics = (query: string): LibraryTopic[] => {
    const needle = query.trim().toLowerCase();
    if (needle === '') {
        return [];
    }
    return allTopics().filter(
        (t) =>
            t.id.includes(needle) || t.title.toLowerCase().includes(needle) || t.content.toLowerCase().includes(needle),
    );
};
