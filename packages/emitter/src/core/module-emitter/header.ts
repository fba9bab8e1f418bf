/**
 * Artifact header generation
 */

import type { GenerationResult } from "../../types.js";
import { generateFileHeader } from "../../constants.js";

/**
 * Header naming the tool and each source record once, in request order
 */
export const generateHeader = (results: readonly GenerationResult[]): string =>
  generateFileHeader([...new Set(results.map((result) => result.recordName))]);

export const renderModuleComment = (module: string): string =>
  `/** @module ${module} */`;
