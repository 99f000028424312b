import type { Request } from 'express';
import multer from 'multer';

// Uploads are parsed in memory; the services never touch the filesystem.
export function createUpload(maxUploadBytes: number) {
    return multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: maxUploadBytes, files: 2 },
    });
}

export type Upload = ReturnType<typeof createUpload>;

/** File sent in a multipart field handled by `upload.fields()`. */
export function uploadedFile(req: Request, field: string): Express.Multer.File | undefined {
    const files = req.files;
    if (!files || Array.isArray(files)) return undefined;
    return files[field]?.[0];
}
