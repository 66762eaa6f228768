import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { isBot } from '@/authors';
import type { Config, ReleaseNotes } from '@/types';
import { endGroup, info, setOutput, startGroup } from '@actions/core';

/**
 * Writes the release notes to a file, creating missing parent directories.
 *
 * @param {string} outputFile - Path of the file, relative to the working directory or absolute
 * @param {string} body - The Markdown document
 * @returns {Promise<string>} The absolute path that was written
 */
export async function writeReleaseNotesFile(outputFile: string, body: string): Promise<string> {
  const filePath = resolve(outputFile);

  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, `${body}\n`, 'utf8');
  } catch (error) {
    throw new Error(
      `Failed to write release notes to ${filePath}: ${error instanceof Error ? error.message.trim() : String(error)}`,
      { cause: error },
    );
  }

  return filePath;
}

/**
 * Publishes the release notes to every configured sink.
 *
 * The document always goes to the action log. It is written to `outputFile` when one is set and
 * exposed as the `outputName` step output when `githubOutput` is enabled. The `base-ref`, `head-ref`
 * and `new-contributors` outputs are set on every run.
 *
 * @param {ReleaseNotes} notes - The generated release notes
 * @param {Pick<Config, 'outputFile' | 'githubOutput' | 'outputName'>} options - Output settings
 */
export async function publishReleaseNotes(
  notes: ReleaseNotes,
  { outputFile, githubOutput, outputName }: Pick<Config, 'outputFile' | 'githubOutput' | 'outputName'>,
): Promise<void> {
  startGroup('Release Notes');
  info(notes.body);
  endGroup();

  if (outputFile) {
    const filePath = await writeReleaseNotesFile(outputFile, notes.body);
    info(`Release notes written to ${filePath}`);
  }

  if (githubOutput) {
    setOutput(outputName, notes.body);
  }

  const newContributors = notes.newAuthors.filter((author) => !isBot(author)).toArray();

  setOutput('base-ref', notes.window.baseRef ?? '');
  setOutput('head-ref', notes.window.headRef);
  setOutput('new-contributors', JSON.stringify(newContributors));
}
