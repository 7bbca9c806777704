import { Inject, Module } from '@nestjs/common';
import type { OnModuleDestroy } from '@nestjs/common';
import { GITHUB_CLIENT } from './github-client.token.js';
import type { GithubClient } from './github-client-interface.js';
import { OctokitClient } from './octokit-client.js';

@Module({
  providers: [{ provide: GITHUB_CLIENT, useClass: OctokitClient }],
  exports: [GITHUB_CLIENT],
})
export class GithubModule implements OnModuleDestroy {
  constructor(@Inject(GITHUB_CLIENT) private readonly github: GithubClient) {}

  // Runs on every app.close(), whichever client is bound to the token.
  async onModuleDestroy(): Promise<void> {
    await this.github.close();
  }
}
