import {CycleDetectedError, UnknownParentError, ValidationError} from '../errors.js'
import type {Stage, StageDefinition} from '../types.js'

/**
 * Directed acyclic graph of stages, each extending at most one parent.
 *
 * Parent names are resolved to indices once, at construction. The graph
 * holds every stage; stages only reference their parent by name and index.
 */
export class StageGraph {
  /**
   * Builds and validates a graph.
   * @throws ValidationError on empty/duplicate names, empty commands, or a `parent` input on a root stage
   * @throws UnknownParentError when a parent name does not exist
   * @throws CycleDetectedError when a parent chain revisits a stage
   */
  static build(definitions: StageDefinition[]): StageGraph {
    const indexByName = new Map<string, number>()
    for (const [index, definition] of definitions.entries()) {
      validateDefinition(definition)
      if (indexByName.has(definition.name)) {
        throw new ValidationError(`Duplicate stage name: '${definition.name}'`)
      }

      indexByName.set(definition.name, index)
    }

    const stages: Stage[] = definitions.map((definition, index) => {
      let parentIndex: number | undefined
      if (definition.parent !== undefined) {
        parentIndex = indexByName.get(definition.parent)
        if (parentIndex === undefined) {
          throw new UnknownParentError(definition.name, definition.parent)
        }
      }

      return {
        name: definition.name,
        index,
        parent: definition.parent,
        parentIndex,
        command: definition.command,
        inputs: definition.inputs ? [...definition.inputs] : [],
        env: definition.env,
        timeoutSec: definition.timeoutSec
      }
    })

    detectCycles(stages)
    return new StageGraph(stages)
  }

  private readonly indexByName: Map<string, number>
  private readonly childIndices: number[][]
  private readonly order: number[]

  private constructor(readonly stages: readonly Stage[]) {
    this.indexByName = new Map(stages.map(s => [s.name, s.index]))
    this.childIndices = stages.map(() => [])
    for (const stage of stages) {
      if (stage.parentIndex !== undefined) {
        this.childIndices[stage.parentIndex].push(stage.index)
      }
    }

    this.order = computeOrder(stages, this.childIndices)
  }

  get size(): number {
    return this.stages.length
  }

  has(name: string): boolean {
    return this.indexByName.has(name)
  }

  /** @throws ValidationError when no stage has this name */
  get(name: string): Stage {
    const index = this.indexByName.get(name)
    if (index === undefined) {
      throw new ValidationError(`Unknown stage: '${name}'`)
    }

    return this.stages[index]
  }

  parentOf(name: string): Stage | undefined {
    const {parentIndex} = this.get(name)
    return parentIndex === undefined ? undefined : this.stages[parentIndex]
  }

  /** Direct children, in declaration order. */
  children(name: string): Stage[] {
    return this.childIndices[this.get(name).index].map(i => this.stages[i])
  }

  /** Every stage that transitively extends `name`. */
  descendants(name: string): Set<string> {
    const result = new Set<string>()
    const queue = [this.get(name).index]
    for (let current = queue.shift(); current !== undefined; current = queue.shift()) {
      for (const child of this.childIndices[current]) {
        result.add(this.stages[child].name)
        queue.push(child)
      }
    }

    return result
  }

  /** Parent chain from the direct parent up to the root. */
  ancestors(name: string): string[] {
    const result: string[] = []
    for (let parent = this.parentOf(name); parent; parent = this.parentOf(parent.name)) {
      result.push(parent.name)
    }

    return result
  }

  /** Stages no other stage extends. */
  leaves(): Stage[] {
    return this.stages.filter(s => this.childIndices[s.index].length === 0)
  }

  /**
   * Every stage after its parent. Among stages that are ready at the same
   * time, the one declared first comes first, so the order is reproducible.
   */
  topologicalOrder(): Stage[] {
    return this.order.map(i => this.stages[i])
  }

  /** Graph restricted to `targets` and their ancestors, declaration order kept. */
  subgraph(targets: string[]): StageGraph {
    const keep = new Set<string>()
    for (const target of targets) {
      keep.add(this.get(target).name)
      for (const ancestor of this.ancestors(target)) {
        keep.add(ancestor)
      }
    }

    return StageGraph.build(this.stages
      .filter(s => keep.has(s.name))
      .map(s => ({
        name: s.name,
        parent: s.parent,
        command: s.command,
        inputs: s.inputs,
        env: s.env,
        timeoutSec: s.timeoutSec
      })))
  }
}

function validateDefinition(definition: StageDefinition): void {
  if (typeof definition.name !== 'string' || definition.name.trim() === '') {
    throw new ValidationError('Invalid stage: name must be a non-empty string')
  }

  const {command} = definition
  const emptyCommand = typeof command === 'string'
    ? command.trim() === ''
    : !Array.isArray(command) || command.length === 0 || command.some(arg => typeof arg !== 'string')
  if (emptyCommand) {
    throw new ValidationError(`Invalid stage ${definition.name}: command must be a non-empty string or argument list`)
  }

  if (definition.parent === undefined && definition.inputs?.some(input => input.kind === 'parent')) {
    throw new ValidationError(`Invalid stage ${definition.name}: a parent input requires a parent stage`)
  }
}

/** Follow every parent chain; a chain that revisits a stage is a cycle. */
function detectCycles(stages: Stage[]): void {
  const acyclic = new Set<number>()
  for (const stage of stages) {
    const chain: number[] = []
    const onChain = new Set<number>()
    let current: number | undefined = stage.index
    while (current !== undefined && !acyclic.has(current)) {
      if (onChain.has(current)) {
        const start = chain.indexOf(current)
        const cycle = [...chain.slice(start), current].map(i => stages[i].name)
        throw new CycleDetectedError(cycle)
      }

      chain.push(current)
      onChain.add(current)
      current = stages[current].parentIndex
    }

    for (const index of chain) {
      acyclic.add(index)
    }
  }
}

/** Kahn's algorithm; the ready set is kept sorted by declaration index. */
function computeOrder(stages: readonly Stage[], childIndices: number[][]): number[] {
  const ready = stages.filter(s => s.parentIndex === undefined).map(s => s.index)
  const order: number[] = []
  for (let current = ready.shift(); current !== undefined; current = ready.shift()) {
    order.push(current)
    for (const child of childIndices[current]) {
      insertSorted(ready, child)
    }
  }

  return order
}

function insertSorted(list: number[], value: number): void {
  let i = list.length
  while (i > 0 && list[i - 1] > value) {
    i--
  }

  list.splice(i, 0, value)
}
