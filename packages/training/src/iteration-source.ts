import { expectDefined } from '@lenslab/shared'
import type { Project, TrainingApi } from '@lenslab/vision'
import type { JobHandle, JobSource, JobStatus } from './types'

/**
 * Training iterations as watchable jobs: submitting trains the project,
 * polling reads the iteration back.
 */
export class IterationJobSource implements JobSource<Project> {
  constructor(private readonly client: TrainingApi) {}

  async submit(project: Project): Promise<JobHandle> {
    const iteration = await this.client.trainProject(project.id)
    return { id: iteration.id, status: iteration.status, parentId: project.id }
  }

  async poll(handle: JobHandle): Promise<JobStatus> {
    const projectId = expectDefined(
      handle.parentId,
      `Iteration ${handle.id} has no project id`,
    )
    const iteration = await this.client.getIteration(projectId, handle.id)
    return iteration.status
  }
}
