/**
 * Format file size in human-readable format
 */
export const formatFileSize = (bytes: number): string => {
    const sizes = ['Bytes', 'KB', 'MB', 'GB', 'TB'];
    if (bytes === 0) return '0 Bytes';

    const i = Math.floor(Math.log(bytes) / Math.log(1024));
    return Math.round(bytes / Math.pow(1024, i) * 100) / 100 + ' ' + sizes[i];
}

/**
 * Join names into one comma-separated, URI-encoded header value
 */
export const encodeHeaderList = (names: string[]): string => {
    return names.map(name => encodeURIComponent(name)).join(',');
}
