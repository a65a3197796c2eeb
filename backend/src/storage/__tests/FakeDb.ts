/**
 * In-process stand-in for the parts of the MongoDB driver the storage
 * manager uses: createIndex, findOne, updateOne, replaceOne and find cursors.
 */

type Doc = Record<string, unknown>

function isOperatorObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !(value instanceof Date) &&
    Object.keys(value).some(key => key.startsWith('$'))
}

function matches(doc: Doc, filter: Doc): boolean {
  return Object.entries(filter).every(([key, condition]) => {
    const value = doc[key]
    if (isOperatorObject(condition)) {
      if ('$gte' in condition) return typeof value === 'number' && value >= Number(condition.$gte)
      if ('$gt' in condition) return typeof value === 'number' && value > Number(condition.$gt)
      return false
    }
    return value === condition
  })
}

function project(doc: Doc, projection?: Doc): Doc {
  const copy = { ...doc }
  if (projection?._id === 0) delete copy._id
  return copy
}

class FakeCursor {
  constructor(private docs: Doc[]) { }

  sort(spec: Record<string, 1 | -1>): this {
    const [[key, direction]] = Object.entries(spec)
    this.docs.sort((a, b) => String(a[key]).localeCompare(String(b[key])) * direction)
    return this
  }

  skip(n: number): this {
    this.docs = this.docs.slice(n)
    return this
  }

  limit(n: number): this {
    this.docs = this.docs.slice(0, n)
    return this
  }

  async toArray(): Promise<Doc[]> {
    return this.docs.map(doc => ({ ...doc }))
  }
}

export class FakeCollection {
  docs: Doc[] = []
  indexes: Array<{ keys: Doc, options?: Doc }> = []
  private nextId = 1

  async createIndex(keys: Doc, options?: Doc): Promise<string> {
    this.indexes.push({ keys, options })
    return Object.keys(keys).join('_')
  }

  async findOne(filter: Doc, options?: { projection?: Doc }): Promise<Doc | null> {
    const doc = this.docs.find(d => matches(d, filter))
    return doc === undefined ? null : project(doc, options?.projection)
  }

  async updateOne(
    filter: Doc,
    update: { $inc?: Record<string, number>, $set?: Doc },
    options?: { upsert?: boolean }
  ): Promise<{ matchedCount: number, upsertedCount: number }> {
    let doc = this.docs.find(d => matches(d, filter))
    let upserted = false
    if (doc === undefined) {
      if (options?.upsert !== true) return { matchedCount: 0, upsertedCount: 0 }
      doc = { _id: this.nextId++ }
      for (const [key, value] of Object.entries(filter)) {
        if (!isOperatorObject(value)) doc[key] = value
      }
      this.docs.push(doc)
      upserted = true
    }
    for (const [key, delta] of Object.entries(update.$inc ?? {})) {
      doc[key] = Number(doc[key] ?? 0) + delta
    }
    Object.assign(doc, update.$set ?? {})
    return { matchedCount: upserted ? 0 : 1, upsertedCount: upserted ? 1 : 0 }
  }

  async replaceOne(filter: Doc, replacement: Doc, options?: { upsert?: boolean }): Promise<{ matchedCount: number }> {
    const index = this.docs.findIndex(d => matches(d, filter))
    if (index >= 0) {
      this.docs[index] = { _id: this.docs[index]._id, ...replacement }
      return { matchedCount: 1 }
    }
    if (options?.upsert === true) {
      this.docs.push({ _id: this.nextId++, ...replacement })
    }
    return { matchedCount: 0 }
  }

  find(filter: Doc): FakeCursor {
    return new FakeCursor(this.docs.filter(d => matches(d, filter)))
  }
}

export class FakeDb {
  readonly collections = new Map<string, FakeCollection>()

  collection(name: string): FakeCollection {
    let collection = this.collections.get(name)
    if (collection === undefined) {
      collection = new FakeCollection()
      this.collections.set(name, collection)
    }
    return collection
  }
}
