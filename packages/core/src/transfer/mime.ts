import { posix } from "node:path";

export type MimeClass = "text" | "document" | "image" | "archive" | "binary";

const TEXT_EXTENSIONS = new Set([
    ".txt", ".log", ".md", ".csv", ".tsv", ".json", ".jsonl", ".xml", ".yaml", ".yml", ".toml", ".ini", ".cfg",
    ".html", ".htm", ".css", ".js", ".ts", ".py", ".sh", ".sql", ".r", ".ipynb", ".env"
]);
const DOCUMENT_EXTENSIONS = new Set([".pdf"]);
const IMAGE_MIME: Record<string, string> = {
    ".png": "image/png",
    ".jpg": "image/jpeg",
    ".jpeg": "image/jpeg",
    ".gif": "image/gif",
    ".svg": "image/svg+xml",
    ".webp": "image/webp",
    ".bmp": "image/bmp"
};
const ARCHIVE_EXTENSIONS = new Set([".zip", ".tar", ".gz", ".tgz", ".bz2", ".xz", ".7z", ".rar", ".whl", ".jar"]);

export function inferMimeClass(path: string): MimeClass {
    const ext = posix.extname(path).toLowerCase();
    if (TEXT_EXTENSIONS.has(ext)) return "text";
    if (DOCUMENT_EXTENSIONS.has(ext)) return "document";
    if (ext in IMAGE_MIME) return "image";
    if (ARCHIVE_EXTENSIONS.has(ext)) return "archive";
    return "binary";
}

export function imageMimeType(path: string): string | undefined {
    return IMAGE_MIME[posix.extname(path).toLowerCase()];
}

/** Classes a remote converter can turn into plain text. */
export function supportsTextExtraction(mimeClass: MimeClass): boolean {
    return mimeClass === "text" || mimeClass === "document";
}
