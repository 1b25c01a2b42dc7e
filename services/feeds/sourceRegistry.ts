// services/feeds/sourceRegistry.ts
import fs from 'fs';
import path from 'path';
import { FeedSourceListSchema } from '../../utils/validationSchemas';
import { ConfigError, describeError } from '../../utils/errors';
import type { IFeedSource } from '../../types';

/**
 * Loads and validates the feed source list. Relative paths resolve from the working directory.
 */
export const loadSources = (file: string): IFeedSource[] => {
    const fullPath = path.resolve(process.cwd(), file);

    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(fullPath, 'utf-8'));
    } catch (err) {
        throw new ConfigError([`SOURCES_FILE (${fullPath}): ${describeError(err)}`]);
    }

    const result = FeedSourceListSchema.safeParse(parsed);
    if (!result.success) {
        throw new ConfigError(result.error.issues.map(i => `sources[${i.path.join('.')}]: ${i.message}`));
    }

    const names = new Set<string>();
    for (const source of result.data) {
        if (names.has(source.name)) {
            throw new ConfigError([`sources: duplicate source name "${source.name}"`]);
        }
        names.add(source.name);
    }
    return result.data;
};
