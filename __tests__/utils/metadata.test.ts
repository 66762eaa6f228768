import { stubInputEnv } from '@/tests/helpers/inputs';
import { ACTION_INPUTS, createConfigFromInputs } from '@/utils/metadata';
import { getBooleanInput, getInput } from '@actions/core';
import { beforeEach, describe, expect, it, vi } from 'vitest';

describe('utils/metadata', () => {
  describe('ACTION_INPUTS', () => {
    it('should contain all expected input configurations', () => {
      expect(Object.keys(ACTION_INPUTS)).toEqual([
        'github_token',
        'repository',
        'base-ref',
        'head-ref',
        'release-version',
        'output-file',
        'github-output',
        'output-name',
      ]);
    });

    it('should have correct metadata structure for required inputs', () => {
      expect(ACTION_INPUTS.github_token).toEqual({ configKey: 'githubToken', required: true, type: 'string' });
      expect(ACTION_INPUTS['github-output']).toEqual({ configKey: 'githubOutput', required: true, type: 'boolean' });
      expect(ACTION_INPUTS['output-name']).toEqual({ configKey: 'outputName', required: true, type: 'string' });
    });

    it('should have correct metadata structure for optional string inputs', () => {
      for (const inputName of ['repository', 'base-ref', 'head-ref', 'release-version', 'output-file']) {
        expect(ACTION_INPUTS[inputName]).toEqual({
          configKey: expect.any(String),
          required: false,
          type: 'string',
        });
      }
    });
  });

  describe('createConfigFromInputs()', () => {
    beforeEach(() => {
      stubInputEnv();
    });

    it('should read every input with its own reader', () => {
      createConfigFromInputs();

      expect(getInput).toHaveBeenCalledWith('github_token', { required: true });
      expect(getInput).toHaveBeenCalledWith('base-ref', { required: false });
      expect(getBooleanInput).toHaveBeenCalledWith('github-output', { required: true });
      expect(getBooleanInput).toHaveBeenCalledTimes(1);
    });

    it('should trim string values', () => {
      stubInputEnv({ 'release-version': '  v2.0.0  ', 'output-file': ' notes.md' });

      expect(createConfigFromInputs()).toMatchObject({ releaseVersion: 'v2.0.0', outputFile: 'notes.md' });
    });

    it('should name the input that failed and keep the cause', () => {
      const cause = new Error('Input required and not supplied: github_token');
      vi.mocked(getInput).mockImplementationOnce(() => {
        throw cause;
      });

      expect(() => createConfigFromInputs()).toThrow(
        new Error("Failed to process input 'github_token': Input required and not supplied: github_token"),
      );
    });

    it('should describe values that are not errors', () => {
      vi.mocked(getInput).mockImplementationOnce(() => {
        throw 'unexpected value';
      });

      expect(() => createConfigFromInputs()).toThrow("Failed to process input 'github_token': unexpected value");
    });
  });
});
