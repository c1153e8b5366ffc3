import { StorageError } from '../../domain/errors/PipelineErrors';

export interface ObjectLocation {
    bucket: string;
    /** Object key; empty for a bare bucket prefix */
    key: string;
}

/**
 * Splits `scheme://bucket/key` into its parts.
 * Rejects any other scheme, and a missing key when `requireKey` is set.
 */
export function parseObjectUri(
    uri: string,
    options: { scheme?: string; requireKey?: boolean } = {}
): ObjectLocation {
    const scheme = options.scheme ?? 'gs';
    const prefix = `${scheme}://`;

    if (!uri.startsWith(prefix)) {
        throw new StorageError(`Invalid object URI "${uri}": must start with '${prefix}'`, uri);
    }

    const remainder = uri.slice(prefix.length);
    const slash = remainder.indexOf('/');
    const bucket = slash === -1 ? remainder : remainder.slice(0, slash);
    const key = slash === -1 ? '' : remainder.slice(slash + 1);

    if (!bucket) {
        throw new StorageError(`Invalid object URI "${uri}": missing bucket name`, uri);
    }
    if (options.requireKey && !key) {
        throw new StorageError(`Invalid object URI "${uri}": missing object key`, uri);
    }

    return { bucket, key };
}

/**
 * Builds a job-scoped folder URI below a prefix, always ending in '/'.
 */
export function jobOutputUri(prefix: string, jobId: string): string {
    return `${prefix.replace(/\/+$/, '')}/${jobId}/`;
}
