// src/delegation/infrastructure/RoutingConfigLoader.ts

import fs from 'fs';
import path from 'path';

import type { RoutingTable } from '../domain/Routing';
import { parseRoutingConfigDto, RoutingConfigValidationError } from '../dto/RoutingConfigDto';

/**
 * Read the routing table from disk. Unlike agent sources this is fatal:
 * the service cannot route without it.
 */
export function loadRoutingTable(filePath: string): RoutingTable {
  const resolved = path.resolve(filePath);

  let raw: string;
  try {
    raw = fs.readFileSync(resolved, 'utf8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new RoutingConfigValidationError('Routing config not readable', [`${resolved}: ${message}`]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new RoutingConfigValidationError('Routing config is not valid JSON', [`${resolved}: ${message}`]);
  }

  return parseRoutingConfigDto(parsed);
}
