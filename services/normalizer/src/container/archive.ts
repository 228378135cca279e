/**
 * Presentation container extraction and reconstruction
 *
 * A presentation is a ZIP archive; narration lives under ppt/media/.
 * Extraction unpacks every entry (never a selection) into a scratch tree,
 * and repacking writes every file found in that tree back, in the original
 * entry order, so untouched parts keep their paths and bytes. Entry data is
 * streamed to and from disk; JSZip still needs the source archive's bytes to
 * read its central directory.
 */

import { createReadStream, createWriteStream, type Dirent, type Stats } from 'node:fs';
import { copyFile, mkdir, open, readdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import JSZip from 'jszip';
import type { ContainerManifest } from '@leveler/contracts';
import type { Logger } from '../lib/logger.js';
import { ContainerIntegrityError, ValidationError, errorMessage } from '../lib/errors.js';
import { writeAtomically } from '../lib/scratch.js';
import { isAudioFile } from '../audio/codecs.js';

/** Conventional location of embedded media inside the archive */
export const MEDIA_DIR = 'ppt/media';

export const CONTAINER_EXTENSION = '.pptx';

/** Files above this size are streamed into the output archive */
const STREAM_THRESHOLD_BYTES = 4 * 1024 * 1024;

const ZIP_SIGNATURES = [
  Buffer.from([0x50, 0x4b, 0x03, 0x04]), // local file header
  Buffer.from([0x50, 0x4b, 0x05, 0x06]), // empty archive
];

export interface ExtractedContainer {
  treePath: string;
  manifest: ContainerManifest;
  /** Absolute paths of audio files under MEDIA_DIR, sorted by name */
  audioFiles: string[];
}

/**
 * Check that the input exists, is a file and carries a ZIP signature
 */
export async function validateContainer(containerPath: string): Promise<void> {
  let info: Stats;
  try {
    info = await stat(containerPath);
  } catch {
    throw new ValidationError(`File not found: ${containerPath}`, containerPath);
  }
  if (!info.isFile()) {
    throw new ValidationError(`Not a file: ${containerPath}`, containerPath);
  }

  const handle = await open(containerPath, 'r');
  try {
    const header = Buffer.alloc(4);
    const { bytesRead } = await handle.read(header, 0, 4, 0);
    const isZip = bytesRead === 4 && ZIP_SIGNATURES.some((sig) => sig.equals(header));
    if (!isZip) {
      throw new ContainerIntegrityError(
        `Not a valid presentation file (not a ZIP archive): ${containerPath}`,
        containerPath
      );
    }
  } finally {
    await handle.close();
  }
}

function toPosix(relative: string): string {
  return relative.split(path.sep).join('/');
}

/**
 * Resolve an entry name under root, refusing names that escape it
 */
function resolveEntry(root: string, entryName: string): string {
  const target = path.resolve(root, entryName);
  if (target !== root && !target.startsWith(root + path.sep)) {
    throw new ContainerIntegrityError(`Archive entry escapes extraction root: ${entryName}`);
  }
  return target;
}

/**
 * Entry name as it sits in the extracted tree: "." and empty segments
 * collapsed, directories keeping their trailing "/". Empty for the root.
 */
function treeName(root: string, entryName: string): string {
  const relative = toPosix(path.relative(root, resolveEntry(root, entryName)));
  if (relative === '') return '';
  return entryName.endsWith('/') ? `${relative}/` : relative;
}

/**
 * Audio files directly inside MEDIA_DIR, sorted by name
 */
export async function findAudioFiles(treePath: string): Promise<string[]> {
  const mediaDir = path.join(treePath, ...MEDIA_DIR.split('/'));
  let entries: Dirent[];
  try {
    entries = await readdir(mediaDir, { withFileTypes: true });
  } catch {
    return [];
  }

  return entries
    .filter((entry) => entry.isFile() && isAudioFile(entry.name))
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(mediaDir, name));
}

/**
 * Unpack every entry of the archive into scratchRoot/contents
 *
 * @throws ContainerIntegrityError if the archive cannot be read, before anything is written
 */
export async function extractContainer(
  containerPath: string,
  scratchRoot: string,
  logger: Logger
): Promise<ExtractedContainer> {
  logger.info({ container: containerPath }, `Extracting: ${path.basename(containerPath)}`);

  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(await readFile(containerPath));
  } catch (error) {
    throw new ContainerIntegrityError(
      `Cannot read archive ${path.basename(containerPath)}: ${errorMessage(error)}`,
      containerPath
    );
  }

  const treePath = path.resolve(scratchRoot, 'contents');
  const entries = Object.values(zip.files);

  // Validate every name before touching the disk
  const targets = entries.map((entry) => ({ entry, target: resolveEntry(treePath, entry.name) }));

  await mkdir(treePath, { recursive: true });
  for (const { entry, target } of targets) {
    if (entry.dir) {
      await mkdir(target, { recursive: true });
      continue;
    }
    await mkdir(path.dirname(target), { recursive: true });
    await pipeline(entry.nodeStream('nodebuffer'), createWriteStream(target));
  }

  logger.debug({ treePath, entries: entries.length }, 'Extracted archive');

  const audioFiles = await findAudioFiles(treePath);
  for (const file of audioFiles) {
    logger.debug({ file: path.basename(file) }, 'Found audio file');
  }
  logger.info({ count: audioFiles.length }, `Found ${audioFiles.length} audio file(s)`);

  return {
    treePath,
    manifest: {
      entries: entries.map((entry) => entry.name),
      mediaAudio: audioFiles.map((file) => toPosix(path.relative(treePath, file))),
    },
    audioFiles,
  };
}

interface TreeListing {
  files: string[];
  dirs: string[];
}

/**
 * Every file and directory under root as "/"-separated relative paths.
 * Directories end with "/".
 */
async function listTree(root: string): Promise<TreeListing> {
  const files: string[] = [];
  const dirs: string[] = [];

  const walk = async (dir: string): Promise<void> => {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      const relative = toPosix(path.relative(root, full));
      if (entry.isDirectory()) {
        dirs.push(`${relative}/`);
        await walk(full);
      } else if (entry.isFile()) {
        files.push(relative);
      }
    }
  };

  await walk(root);
  return { files: files.sort(), dirs: dirs.sort() };
}

/**
 * Stream a DEFLATE archive of the whole tree to outputPath.
 *
 * Entries named in the manifest come first, in manifest order; files added
 * since extraction follow in name order. Directory entries are kept only
 * where the source archive had them.
 *
 * @throws ContainerIntegrityError if a manifest file is missing from the tree
 */
export async function repackContainer(
  treePath: string,
  outputPath: string,
  logger: Logger,
  manifest?: ContainerManifest
): Promise<void> {
  logger.info({ output: outputPath }, `Reconstructing: ${path.basename(outputPath)}`);

  const listing = await listTree(treePath);
  const fileSet = new Set(listing.files);
  const dirSet = new Set(listing.dirs);

  const ordered: string[] = [];
  const seen = new Set<string>();
  for (const raw of manifest?.entries ?? []) {
    const entry = treeName(treePath, raw);
    if (entry === '' || seen.has(entry)) continue;
    if (entry.endsWith('/')) {
      if (dirSet.has(entry)) {
        ordered.push(entry);
        seen.add(entry);
      }
      continue;
    }
    if (!fileSet.has(entry)) {
      throw new ContainerIntegrityError(`Entry missing from extracted tree: ${raw}`);
    }
    ordered.push(entry);
    seen.add(entry);
  }
  for (const file of listing.files) {
    if (!seen.has(file)) ordered.push(file);
  }

  const zip = new JSZip();
  for (const entry of ordered) {
    if (entry.endsWith('/')) {
      zip.file(entry, null, { dir: true, createFolders: false });
      continue;
    }
    // Small parts are buffered so a deck with many entries holds few open files
    const source = resolveEntry(treePath, entry);
    const { size } = await stat(source);
    if (size > STREAM_THRESHOLD_BYTES) {
      zip.file(entry, createReadStream(source), { createFolders: false });
    } else {
      zip.file(entry, await readFile(source), { createFolders: false });
    }
    logger.debug({ entry }, 'Added to archive');
  }

  await mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
  await writeAtomically(outputPath, (tmp) =>
    pipeline(
      zip.generateNodeStream({
        type: 'nodebuffer',
        streamFiles: true,
        compression: 'DEFLATE',
        compressionOptions: { level: 6 },
      }),
      createWriteStream(tmp)
    )
  );

  logger.info({ output: outputPath, entries: ordered.length }, 'Reconstruction complete');
}

/**
 * Byte-for-byte copy, used when a container has no audio to touch
 */
export async function copyContainerVerbatim(inputPath: string, outputPath: string): Promise<void> {
  await mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
  await writeAtomically(outputPath, (tmp) => copyFile(inputPath, tmp));
}
