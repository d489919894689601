import {readFile} from 'node:fs/promises'
import process from 'node:process'
import {dirname, extname, resolve} from 'node:path'
import {deburr} from 'lodash-es'
import {parse as parseYaml} from 'yaml'
import {ValidationError} from '../errors.js'
import type {BuildDefinition, InputDeclaration, LoadedBuild, StageDefinition} from '../types.js'
import {StageGraph} from './stage-graph.js'

/**
 * Turns build files (YAML or JSON) and plain objects into validated builds.
 *
 * The loaded build's `root` is the directory holding the file, or the current
 * directory for objects; file inputs are resolved against it.
 */
export class DefinitionLoader {
  async load(input: string | BuildDefinition): Promise<LoadedBuild> {
    if (typeof input === 'string') {
      const content = await readFile(input, 'utf8')
      return this.parse(content, input)
    }

    return this.resolve(input, process.cwd())
  }

  parse(content: string, filePath: string): LoadedBuild {
    const raw = parseBuildFile(content, filePath)
    return this.resolve(raw, dirname(resolve(filePath)))
  }

  private resolve(raw: unknown, root: string): LoadedBuild {
    if (!isRecord(raw)) {
      throw new ValidationError('Invalid build: expected an object')
    }

    const id = optionalString(raw.id, 'id')
    const name = optionalString(raw.name, 'name')
    if (!id && !name) {
      throw new ValidationError('Invalid build: at least one of "id" or "name" must be defined')
    }

    if (!Array.isArray(raw.stages) || raw.stages.length === 0) {
      throw new ValidationError('Invalid build: stages must be a non-empty array')
    }

    const stages = raw.stages.map((stage: unknown, index) => parseStage(stage, index))

    // Structural checks (names, parents, cycles) happen here rather than at run time
    StageGraph.build(stages)

    const buildId = id ?? slugify(name ?? '')
    if (buildId === '') {
      throw new ValidationError(`Invalid build: cannot derive an id from name '${name ?? ''}'`)
    }

    return {id: buildId, name, stages, root}
  }
}

function parseStage(raw: unknown, index: number): StageDefinition {
  if (!isRecord(raw)) {
    throw new ValidationError(`Invalid stage #${index + 1}: expected an object`)
  }

  if (typeof raw.name !== 'string' || raw.name === '') {
    throw new ValidationError(`Invalid stage #${index + 1}: name is required`)
  }

  const name = raw.name
  const stage: StageDefinition = {name, command: parseCommand(name, raw.command)}

  const parent = optionalString(raw.parent, `parent of stage ${name}`)
  if (parent !== undefined) {
    stage.parent = parent
  }

  if (raw.inputs !== undefined) {
    if (!Array.isArray(raw.inputs)) {
      throw new ValidationError(`Invalid stage ${name}: inputs must be an array`)
    }

    stage.inputs = raw.inputs.map((input: unknown) => parseInput(name, input))
  }

  if (raw.env !== undefined) {
    stage.env = parseEnv(name, raw.env)
  }

  if (raw.timeoutSec !== undefined) {
    if (typeof raw.timeoutSec !== 'number' || !(raw.timeoutSec > 0)) {
      throw new ValidationError(`Invalid stage ${name}: timeoutSec must be a positive number`)
    }

    stage.timeoutSec = raw.timeoutSec
  }

  return stage
}

function parseCommand(stage: string, command: unknown): string | string[] {
  if (typeof command === 'string') {
    return command
  }

  if (Array.isArray(command) && command.every((arg): arg is string => typeof arg === 'string')) {
    return command
  }

  throw new ValidationError(`Invalid stage ${stage}: command must be a string or an array of strings`)
}

function parseInput(stage: string, raw: unknown): InputDeclaration {
  if (!isRecord(raw)) {
    throw new ValidationError(`Invalid stage ${stage}: each input must be an object`)
  }

  const {kind, value} = raw
  if (kind === 'parent') {
    return {kind}
  }

  if (kind !== 'text' && kind !== 'file') {
    throw new ValidationError(`Invalid stage ${stage}: unknown input kind '${String(kind)}'`)
  }

  if (typeof value !== 'string' || (kind === 'file' && value === '')) {
    throw new ValidationError(`Invalid stage ${stage}: ${kind} input requires a non-empty string value`)
  }

  return {kind, value}
}

function parseEnv(stage: string, raw: unknown): Record<string, string> {
  if (!isRecord(raw)) {
    throw new ValidationError(`Invalid stage ${stage}: env must be a mapping`)
  }

  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
      throw new ValidationError(`Invalid stage ${stage}: env.${key} must be a scalar`)
    }

    env[key] = String(value)
  }

  return env
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value !== 'string') {
    throw new ValidationError(`Invalid build: ${field} must be a string`)
  }

  return value
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Convert a free-form name into a valid identifier. */
export function slugify(name: string): string {
  return deburr(name)
    .toLowerCase()
    .replaceAll(/[^\w-]/g, '-')
    .replaceAll(/-{2,}/g, '-')
    .replace(/^-/, '')
    .replace(/-$/, '')
}

export function parseBuildFile(content: string, filePath: string): unknown {
  const ext = extname(filePath).toLowerCase()
  if (ext === '.yaml' || ext === '.yml') {
    return parseYaml(content)
  }

  return JSON.parse(content)
}
