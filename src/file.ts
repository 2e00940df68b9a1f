import fs from 'fs/promises';
import fp from 'path';
import yaml from 'js-yaml';

import { jsonStringify } from './util';

export const checkFileExists = async (path: string): Promise<boolean> => {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
};

export const joinPath = (...paths: readonly string[]): string => {
  return fp.join(...paths);
};

//

export const loadText = async (path: string): Promise<string> => {
  return await fs.readFile(path, 'utf-8');
};

export const loadYaml = async (path: string): Promise<unknown> => {
  const text = await loadText(path);
  return yaml.load(text);
};

export const loadJson = async (path: string): Promise<unknown> => {
  const text = await loadText(path);
  const object: unknown = JSON.parse(text);
  return object;
};

//

// Creates missing parent directories; `mode` applies when the file is created
export const saveText = async (path: string, text: string, mode?: number): Promise<void> => {
  const directory = fp.dirname(path);
  if (!(await checkFileExists(directory))) {
    await fs.mkdir(directory, { recursive: true });
  }
  await fs.writeFile(path, text, { mode });
};

export const saveJson = async (path: string, object: unknown): Promise<void> => {
  const text = jsonStringify(object, true);
  await saveText(path, text + '\n');
};
