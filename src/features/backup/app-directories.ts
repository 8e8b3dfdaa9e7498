import path from 'path';
import { FileRoots } from './types';

/** Local directories that hold user files, one per archived tree. */
export function resolveFileRoots(dataDir: string): FileRoots {
    const root = path.resolve(dataDir);
    return {
        upload: path.join(root, 'upload'),
        images: path.join(root, 'images'),
        avatars: path.join(root, 'avatars')
    };
}
