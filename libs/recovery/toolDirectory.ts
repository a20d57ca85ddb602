/**
 * Rebound Tool Substitution Directory
 *
 * Static graph of tool → ranked substitutes, loaded once from
 * data/toolDirectory.json. Alternatives are not guaranteed reciprocal.
 * Constraint flags exclude substitutes by their declared tags.
 */

import { z } from 'zod';
import { logger } from '../logging/logger.js';
import { validate } from '../validation/zod-middleware.js';
import { RecoveryStrategy } from './recoveryTypes.js';
import toolDirectoryData from './data/toolDirectory.json' with { type: 'json' };

export const TOOL_TAGS = ['requires_privileges', 'slow', 'network_bound', 'requires_auth'] as const;
export type ToolTag = typeof TOOL_TAGS[number];

export const CONSTRAINT_FLAGS = [
    'require_no_privileges',
    'prefer_faster_tools',
    'prefer_offline_tools',
    'no_auth_required'
] as const;
export type ConstraintFlag = typeof CONSTRAINT_FLAGS[number];

/**
 * Which tag each constraint flag excludes.
 */
export const CONSTRAINT_EXCLUSIONS: Readonly<Record<ConstraintFlag, ToolTag>> = Object.freeze({
    require_no_privileges: 'requires_privileges',
    prefer_faster_tools: 'slow',
    prefer_offline_tools: 'network_bound',
    no_auth_required: 'requires_auth'
});

const ToolDirectorySchema = z.object({
    alternatives: z.record(z.string().min(1), z.array(z.string().min(1))),
    tags: z.record(z.string().min(1), z.array(z.enum(TOOL_TAGS)))
});

/**
 * Read-only lookups over a loaded directory. The backing maps stay
 * private to the loader.
 */
export interface ToolDirectory {
    alternativesOf(tool: string): readonly string[];
    tagsOf(tool: string): readonly ToolTag[];
}

const NONE: readonly never[] = Object.freeze([]);

/**
 * Validate a directory definition and close over frozen copies of it.
 */
export function loadToolDirectory(raw: unknown): ToolDirectory {
    const parsed = validate(ToolDirectorySchema, raw, 'ToolDirectory:Load', 'CONFIG');

    const alternatives = new Map<string, readonly string[]>(
        Object.entries(parsed.alternatives).map(([tool, list]) => [tool, Object.freeze([...list])])
    );
    const tags = new Map<string, readonly ToolTag[]>(
        Object.entries(parsed.tags).map(([tool, list]) => [tool, Object.freeze([...new Set(list)])])
    );

    logger.debug({ tools: alternatives.size, taggedTools: tags.size }, 'Tool directory loaded');

    return Object.freeze({
        alternativesOf: (tool: string) => alternatives.get(tool) ?? NONE,
        tagsOf: (tool: string) => tags.get(tool) ?? NONE
    });
}

export const TOOL_DIRECTORY: ToolDirectory = loadToolDirectory(toolDirectoryData);

/**
 * Ranked substitutes for a tool; the best pick is the first entry.
 *
 * Unknown tool → []. If the constraints exclude every substitute, the
 * unfiltered list is returned instead.
 */
export function alternativesFor(
    tool: string,
    constraints: Iterable<ConstraintFlag> = [],
    directory: ToolDirectory = TOOL_DIRECTORY
): readonly string[] {
    const candidates = directory.alternativesOf(tool);
    if (candidates.length === 0) return candidates;

    const excludedTags = new Set<ToolTag>();
    for (const flag of constraints) {
        excludedTags.add(CONSTRAINT_EXCLUSIONS[flag]);
    }
    if (excludedTags.size === 0) return candidates;

    const filtered = candidates.filter(alt => !directory.tagsOf(alt).some(tag => excludedTags.has(tag)));

    if (filtered.length === 0) {
        logger.debug({ tool, constraints: [...excludedTags] }, 'Constraints excluded every alternative, using unfiltered list');
        return candidates;
    }

    return filtered;
}

export function getAlternative(
    tool: string,
    constraints: Iterable<ConstraintFlag> = [],
    directory: ToolDirectory = TOOL_DIRECTORY
): string | undefined {
    return alternativesFor(tool, constraints, directory)[0];
}

export function isConstraintFlag(value: string): value is ConstraintFlag {
    return CONSTRAINT_FLAGS.some(flag => flag === value);
}

/**
 * Constraint flags carried by a switch_tool strategy's parameters.
 */
export function constraintsFromStrategy(strategy: RecoveryStrategy): ConstraintFlag[] {
    return Object.entries(strategy.actionParameters)
        .filter(([, value]) => value === true)
        .map(([name]) => name)
        .filter(isConstraintFlag);
}
