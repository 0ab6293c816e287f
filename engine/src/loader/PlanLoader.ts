/**
 * Plan Loader
 *
 * I/O layer in front of PlanParser: reads plan files from disk and
 * returns validated Plans. The engine itself never touches the
 * filesystem; callers (CLI, tests, embedding services) decide what to
 * load.
 *
 * ```ts
 * const plan = await PlanLoader.fromFile('./plans/dc-limit.yaml');
 * const result = await engine.execute(plan, scenario, inputs);
 * ```
 *
 * @module loader
 */

import { readFile, readdir } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';
import { PlanFileNotFoundError, errorMessage } from '../errors/index.js';
import { PlanParser } from '../parser/PlanParser.js';
import type { Plan } from '../types/plan-types.js';

export const PLAN_FILE_EXTENSIONS: readonly string[] = ['.yaml', '.yml', '.json'];

export class PlanLoader {
  /**
   * Load and validate a plan file (.yaml, .yml or .json)
   *
   * @throws PlanFileNotFoundError when the file cannot be read
   * @throws SchemaError when the content is not a valid plan
   */
  static async fromFile(filePath: string): Promise<Plan> {
    const resolvedPath = resolve(filePath);

    let content: string;
    try {
      content = await readFile(resolvedPath, 'utf-8');
    } catch (error) {
      throw new PlanFileNotFoundError(filePath, new Error(errorMessage(error)));
    }

    return PlanParser.fromContent(content, resolvedPath);
  }

  /**
   * Load every plan file in a directory (not recursive), sorted by file name
   */
  static async fromDirectory(dirPath: string): Promise<Plan[]> {
    const resolvedDir = resolve(dirPath);

    let names: string[];
    try {
      names = await readdir(resolvedDir);
    } catch (error) {
      throw new PlanFileNotFoundError(dirPath, new Error(errorMessage(error)));
    }

    const planFiles = names
      .filter((name) => PLAN_FILE_EXTENSIONS.includes(extname(name).toLowerCase()))
      .sort();

    const plans: Plan[] = [];
    for (const name of planFiles) {
      plans.push(await this.fromFile(join(resolvedDir, name)));
    }
    return plans;
  }
}
