import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { TransportError, ValidationError } from '@lenslab/shared'
import type {
  ImageCreateSummary,
  ImageFileEntry,
  Iteration,
  Project,
  Tag,
  TrainingApi,
} from '@lenslab/vision'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { trainModel } from './train'
import { openTrainingContext, uploadTaggedImages } from './uploads'
import { runClassifierTraining, runDetectorUpload } from './workflows'

const project: Project = { id: 'project-1', name: 'Fruit' }
const tags: Tag[] = [
  { id: 'tag-apple', name: 'apple' },
  { id: 'tag-banana', name: 'banana' },
]

function iteration(status: string): Iteration {
  return { id: 'iter-1', name: 'Iteration 1', status }
}

/** In-memory training service replaying scripted iteration statuses */
class FakeTrainingApi implements TrainingApi {
  uploads: Array<{ bytes: string; tagIds: string[] }> = []
  batches: ImageFileEntry[][] = []
  published: Array<{ iterationId: string; publishName: string }> = []
  statusPolls: string[] = []
  trainCalls = 0
  batchResult: ImageCreateSummary = { isBatchSuccessful: true, images: [] }
  failOn: 'getProject' | null = null

  constructor(private statuses: Array<string | Error> = []) {}

  async getProject(projectId: string): Promise<Project> {
    if (this.failOn === 'getProject') {
      throw new TransportError('GET failed: 401 denied', { statusCode: 401 })
    }
    return { ...project, id: projectId }
  }

  async getTags(): Promise<Tag[]> {
    return tags
  }

  async createImagesFromData(
    _projectId: string,
    data: Uint8Array,
    tagIds: string[],
  ): Promise<ImageCreateSummary> {
    this.uploads.push({ bytes: Buffer.from(data).toString('utf-8'), tagIds })
    return { isBatchSuccessful: true, images: [{ status: 'OK' }] }
  }

  async createImagesFromFiles(
    _projectId: string,
    images: ImageFileEntry[],
  ): Promise<ImageCreateSummary> {
    this.batches.push(images)
    return this.batchResult
  }

  async trainProject(): Promise<Iteration> {
    this.trainCalls++
    return iteration('Training')
  }

  async getIteration(projectId: string, iterationId: string): Promise<Iteration> {
    this.statusPolls.push(`${projectId}/${iterationId}`)
    const next = this.statuses.shift()
    if (next === undefined) throw new Error('no more statuses')
    if (next instanceof Error) throw next
    return iteration(next)
  }

  async publishIteration(
    _projectId: string,
    iterationId: string,
    publishName: string,
  ): Promise<boolean> {
    this.published.push({ iterationId, publishName })
    return true
  }
}

const noSleep = async (): Promise<void> => {}

describe('trainModel', () => {
  test('reports progress and completion', async () => {
    const api = new FakeTrainingApi(['Training', 'Validating', 'Completed'])
    const lines: string[] = []
    const ctx = await openTrainingContext(api, 'project-1')

    const trained = await trainModel(ctx, {
      intervalMs: 5000,
      out: (line) => lines.push(line),
      sleep: noSleep,
    })

    expect(lines).toEqual([
      'Training ...',
      'Validating ...',
      'Model trained!',
    ])
    expect(trained).toEqual({
      iterationId: 'iter-1',
      status: 'Completed',
      polls: 3,
    })
    expect(api.statusPolls).toEqual([
      'project-1/iter-1',
      'project-1/iter-1',
      'project-1/iter-1',
    ])
  })

  test('publishes the completed iteration when asked', async () => {
    const api = new FakeTrainingApi(['Completed'])
    const lines: string[] = []
    const ctx = await openTrainingContext(api, 'project-1')

    const trained = await trainModel(ctx, {
      intervalMs: 1,
      out: (line) => lines.push(line),
      sleep: noSleep,
      publish: { publishName: 'fruit-model', predictionResourceId: 'res-1' },
    })

    expect(trained.publishedAs).toBe('fruit-model')
    expect(api.published).toEqual([
      { iterationId: 'iter-1', publishName: 'fruit-model' },
    ])
    expect(lines.at(-1)).toBe('Published iteration as fruit-model')
  })

  test('turns a failure status into JobFailedError', async () => {
    const api = new FakeTrainingApi(['Training', 'Failed'])
    const ctx = await openTrainingContext(api, 'project-1')

    await expect(
      trainModel(ctx, { intervalMs: 1, out: () => {}, sleep: noSleep }),
    ).rejects.toThrow('Job iter-1 ended with status Failed')
    expect(api.published).toEqual([])
  })

  test('honours custom terminal statuses', async () => {
    const api = new FakeTrainingApi(['Training', 'Cancelled'])
    const ctx = await openTrainingContext(api, 'project-1')

    await expect(
      trainModel(ctx, {
        intervalMs: 1,
        out: () => {},
        sleep: noSleep,
        terminal: { success: ['Completed'], failure: ['Failed', 'Cancelled'] },
      }),
    ).rejects.toThrow('Job iter-1 ended with status Cancelled')
  })

  test('checks the terminal statuses before starting an iteration', async () => {
    const api = new FakeTrainingApi(['Completed'])
    const ctx = await openTrainingContext(api, 'project-1')

    await expect(
      trainModel(ctx, {
        intervalMs: 1,
        out: () => {},
        sleep: noSleep,
        terminal: { success: [], failure: ['Failed'] },
      }),
    ).rejects.toBeInstanceOf(ValidationError)
    expect(api.trainCalls).toBe(0)
    expect(api.statusPolls).toEqual([])
  })
})

describe('runClassifierTraining', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'lenslab-train-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  function writeImage(tag: string, name: string, content: string): void {
    mkdirSync(join(dir, tag), { recursive: true })
    writeFileSync(join(dir, tag, name), content)
  }

  test('uploads each tag folder and trains', async () => {
    writeImage('apple', 'b.jpg', 'apple-b')
    writeImage('apple', 'a.jpg', 'apple-a')
    writeImage('banana', 'c.jpg', 'banana-c')
    const api = new FakeTrainingApi(['Training', 'Completed'])
    const lines: string[] = []

    const result = await runClassifierTraining({
      client: api,
      projectId: 'project-1',
      folder: dir,
      training: {
        intervalMs: 5000,
        out: (line) => lines.push(line),
        sleep: noSleep,
      },
    })

    expect(result).toEqual({
      ok: true,
      value: {
        iterationId: 'iter-1',
        status: 'Completed',
        polls: 2,
        uploaded: 3,
      },
    })
    expect(api.uploads).toEqual([
      { bytes: 'apple-a', tagIds: ['tag-apple'] },
      { bytes: 'apple-b', tagIds: ['tag-apple'] },
      { bytes: 'banana-c', tagIds: ['tag-banana'] },
    ])
    expect(lines).toEqual([
      'Uploading images...',
      'apple',
      'banana',
      'Training ...',
      'Model trained!',
    ])
  })

  test('returns the transport failure of a poll as a typed result', async () => {
    writeImage('apple', 'a.jpg', 'a')
    writeImage('banana', 'b.jpg', 'b')
    const failure = new TransportError('GET failed: 503 busy', {
      statusCode: 503,
    })
    const api = new FakeTrainingApi(['Training', failure])
    const lines: string[] = []

    const result = await runClassifierTraining({
      client: api,
      projectId: 'project-1',
      folder: dir,
      training: {
        intervalMs: 1,
        out: (line) => lines.push(line),
        sleep: noSleep,
      },
    })

    expect(result).toEqual({ ok: false, error: failure })
    expect(lines).toEqual([
      'Uploading images...',
      'apple',
      'banana',
      'Training ...',
    ])
  })

  test('prints only the completion line when the first poll is terminal', async () => {
    writeImage('apple', 'a.jpg', 'a')
    writeImage('banana', 'b.jpg', 'b')
    const api = new FakeTrainingApi(['Completed'])
    const lines: string[] = []

    await runClassifierTraining({
      client: api,
      projectId: 'project-1',
      folder: dir,
      training: {
        intervalMs: 1,
        out: (line) => lines.push(line),
        sleep: noSleep,
      },
    })

    expect(lines).toEqual([
      'Uploading images...',
      'apple',
      'banana',
      'Model trained!',
    ])
  })

  test('rejects overlapping terminal statuses before uploading or training', async () => {
    writeImage('apple', 'a.jpg', 'a')
    writeImage('banana', 'b.jpg', 'b')
    const api = new FakeTrainingApi(['Completed'])

    const result = await runClassifierTraining({
      client: api,
      projectId: 'project-1',
      folder: dir,
      training: {
        intervalMs: 1,
        terminal: { success: ['Completed'], failure: ['Completed'] },
        out: () => {},
        sleep: noSleep,
      },
    })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toBeInstanceOf(ValidationError)
    expect(result.error.message).toBe(
      'Statuses cannot be both success and failure: Completed',
    )
    expect(api.uploads).toEqual([])
    expect(api.trainCalls).toBe(0)
  })

  test('reports a missing tag folder as NOT_FOUND', async () => {
    writeImage('apple', 'a.jpg', 'a')
    const api = new FakeTrainingApi(['Completed'])

    const result = await runClassifierTraining({
      client: api,
      projectId: 'project-1',
      folder: dir,
      training: { intervalMs: 1, out: () => {}, sleep: noSleep },
    })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe('NOT_FOUND')
    expect(result.error.message).toBe(
      `Folder not found: ${join(dir, 'banana')}`,
    )
  })

  test('fails before uploading when the project cannot be read', async () => {
    const api = new FakeTrainingApi()
    api.failOn = 'getProject'

    const result = await runClassifierTraining({
      client: api,
      projectId: 'project-1',
      folder: dir,
      training: { intervalMs: 1, out: () => {}, sleep: noSleep },
    })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toBeInstanceOf(TransportError)
    expect(api.uploads).toEqual([])
  })
})

describe('tagged image uploads', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'lenslab-detect-'))
    writeFileSync(join(dir, 'one.jpg'), 'one')
    writeFileSync(join(dir, 'two.jpg'), 'two')
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  function writeManifest(content: unknown): string {
    const path = join(dir, 'tagged-images.json')
    writeFileSync(path, JSON.stringify(content))
    return path
  }

  const manifest = {
    files: [
      {
        filename: 'one.jpg',
        tags: [
          { tag: 'apple', left: 0.1, top: 0.2, width: 0.3, height: 0.4 },
          { tag: 'banana', left: 0.5, top: 0.5, width: 0.25, height: 0.25 },
        ],
      },
      { filename: 'two.jpg', tags: [] },
    ],
  }

  test('uploads one batch with resolved tag ids', async () => {
    const api = new FakeTrainingApi()
    const lines: string[] = []
    const ctx = await openTrainingContext(api, 'project-1')

    await uploadTaggedImages(ctx, dir, writeManifest(manifest), (line) =>
      lines.push(line),
    )

    expect(api.batches).toHaveLength(1)
    const batch = api.batches[0] ?? []
    expect(batch.map((entry) => entry.name)).toEqual(['one.jpg', 'two.jpg'])
    expect(batch[0]?.regions).toEqual([
      { tagId: 'tag-apple', left: 0.1, top: 0.2, width: 0.3, height: 0.4 },
      { tagId: 'tag-banana', left: 0.5, top: 0.5, width: 0.25, height: 0.25 },
    ])
    expect(new TextDecoder().decode(batch[1]?.contents)).toBe('two')
    expect(lines).toEqual(['Uploading images...', 'Images uploaded.'])
  })

  test('reports each image of a failed batch', async () => {
    const api = new FakeTrainingApi()
    api.batchResult = {
      isBatchSuccessful: false,
      images: [{ status: 'OK' }, { status: 'ErrorImageTooLarge' }],
    }
    const lines: string[] = []

    const result = await runDetectorUpload({
      client: api,
      projectId: 'project-1',
      folder: dir,
      manifestPath: writeManifest(manifest),
      out: (line) => lines.push(line),
    })

    expect(result.ok).toBe(true)
    expect(lines).toEqual([
      'Uploading images...',
      'Image batch upload failed.',
      'Image status: OK',
      'Image status: ErrorImageTooLarge',
    ])
  })

  test('rejects a tag the project does not have', async () => {
    const api = new FakeTrainingApi()

    const result = await runDetectorUpload({
      client: api,
      projectId: 'project-1',
      folder: dir,
      manifestPath: writeManifest({
        files: [
          {
            filename: 'one.jpg',
            tags: [{ tag: 'cherry', left: 0, top: 0, width: 1, height: 1 }],
          },
        ],
      }),
      out: () => {},
    })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.message).toBe('Tag not found: cherry')
    expect(api.batches).toEqual([])
  })

  test('rejects coordinates outside 0..1', async () => {
    const api = new FakeTrainingApi()

    const result = await runDetectorUpload({
      client: api,
      projectId: 'project-1',
      folder: dir,
      manifestPath: writeManifest({
        files: [
          {
            filename: 'one.jpg',
            tags: [{ tag: 'apple', left: 1.5, top: 0, width: 1, height: 1 }],
          },
        ],
      }),
      out: () => {},
    })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe('VALIDATION_ERROR')
  })

  test('rejects a manifest that is not JSON', async () => {
    const path = join(dir, 'broken.json')
    writeFileSync(path, '{ files: ')

    const result = await runDetectorUpload({
      client: new FakeTrainingApi(),
      projectId: 'project-1',
      folder: dir,
      manifestPath: path,
      out: () => {},
    })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe('VALIDATION_ERROR')
  })
})
