/**
 * gcloud invocations
 */

import type { ProcessRunner } from '../runner';

export class GcloudService {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly env: NodeJS.ProcessEnv
  ) {}

  private gcloud(args: string[], quiet = false): Promise<number> {
    return this.runner.run('gcloud', args, { env: this.env, quiet });
  }

  init(): Promise<number> {
    return this.gcloud(['init']);
  }

  authApplicationDefault(): Promise<number> {
    return this.gcloud(['auth', 'application-default', 'login']);
  }

  /**
   * Exit code 0 when the Cloud Run service exists
   */
  describeService(service: string, region: string, project: string): Promise<number> {
    return this.gcloud(
      ['run', 'services', 'describe', service, `--region=${region}`, `--project=${project}`],
      true
    );
  }

  deployImage(service: string, image: string, region: string, project: string): Promise<number> {
    return this.gcloud([
      'run',
      'deploy',
      service,
      `--image=${image}`,
      `--project=${project}`,
      `--region=${region}`,
    ]);
  }

  listRepositories(project: string): Promise<number> {
    return this.gcloud(['artifacts', 'repositories', 'list', `--project=${project}`]);
  }

  listImages(repoPath: string): Promise<number> {
    return this.gcloud(['artifacts', 'docker', 'images', 'list', repoPath]);
  }
}
