import * as os from 'os';
import * as path from 'path';
import * as fsPromises from 'fs/promises';

import { logger } from './logger';

function getCommonSdkRoots(platform: NodeJS.Platform): string[] {
    if (platform === "win32") {
        return [
            path.resolve(process.env.LOCALAPPDATA ?? "", "Android", "sdk")
        ];
    }
    else if (platform === "darwin") {
        return [
            path.resolve(process.env.HOME ?? "/", "Library/Android/sdk")
        ];
    }
    else {
        return [
            path.resolve(process.env.HOME ?? "/", "Android/sdk")
        ];
    }
}

async function isDirectory(dir: string) {
    try {
        let stats = await fsPromises.stat(dir);
        return stats.isDirectory();
    }
    catch {
        return false;
    }
}

async function isValidSdkRoot(sdkRoot: string) {
    return await isDirectory(sdkRoot) && (await isDirectory(path.join(sdkRoot, "ndk")) || await isDirectory(path.join(sdkRoot, "ndk-bundle")));
}

export async function findSdkRoot(): Promise<string | undefined> {
    let sdkRoot = process.env.ANDROID_HOME || process.env.ANDROID_SDK_ROOT;
    if (sdkRoot && await isValidSdkRoot(sdkRoot)) {
        return sdkRoot;
    }

    for (let candidate of getCommonSdkRoots(os.platform())) {
        if (await isValidSdkRoot(candidate)) {
            return candidate;
        }
    }

    return undefined;
}

// Newest first: "100.0.1" before "99.1.0". Non-numeric segments rank lowest.
export function compareVersionsDescending(a: string, b: string): number {
    let left = a.split(".").map((part) => /^\d+$/.test(part) ? Number(part) : -1);
    let right = b.split(".").map((part) => /^\d+$/.test(part) ? Number(part) : -1);

    for (let i = 0; i < Math.max(left.length, right.length); i++) {
        let diff = (right[i] ?? -1) - (left[i] ?? -1);
        if (diff !== 0) {
            return diff;
        }
    }
    return a < b ? 1 : a > b ? -1 : 0;
}

export async function isValidNdkRoot(ndkRoot: string) {
    return await isDirectory(ndkRoot) && await isDirectory(path.join(ndkRoot, "simpleperf"));
}

export async function findNdkRoot(customNdkRoot?: string): Promise<string | undefined> {
    if (customNdkRoot) {
        if (await isValidNdkRoot(customNdkRoot)) {
            return customNdkRoot;
        }

        logger.warn("Specified ndk root is not valid. Trying other options.");
    }

    let ndkRoot = process.env.ANDROID_NDK_ROOT;
    if (ndkRoot && await isValidNdkRoot(ndkRoot)) {
        return ndkRoot;
    }

    let sdkRoot = await findSdkRoot();
    if (!sdkRoot) {
        return undefined;
    }

    let checkDirectoryAndContents = async (root: string) => {
        if (await isValidNdkRoot(root)) {
            return root;
        }

        try {
            // Side-by-side installs live in versioned directories; prefer the newest.
            let files = (await fsPromises.readdir(root)).sort(compareVersionsDescending).map((f) => path.join(root, f));
            for (let file of files) {
                if (await isValidNdkRoot(file)) {
                    return file;
                }
            }
        }
        catch {
            return undefined;
        }
    };

    return await checkDirectoryAndContents(path.resolve(sdkRoot, "ndk")) || await checkDirectoryAndContents(path.resolve(sdkRoot, "ndk-bundle"));
}
