/**
 * createRunRepositoryClient 單元測試
 */

import { describe, it, expect, vi } from 'vitest';
import { createRunRepositoryClient } from '../../../src/services/providers/client-factory.js';
import { GitHubActionsClient } from '../../../src/services/providers/github-actions-client.js';
import { GitLabPipelineClient } from '../../../src/services/providers/gitlab-pipeline-client.js';

const gitlabHosts = vi.hoisted(() => {
  const hosts: unknown[] = [];
  return hosts;
});

vi.mock('@gitbeaker/rest', () => ({
  Gitlab: vi.fn().mockImplementation(function (options: { host?: string }) {
    gitlabHosts.push(options.host);
    return {};
  }),
}));

describe('createRunRepositoryClient', () => {
  it('github 建立 GitHubActionsClient（token 可省略）', () => {
    const client = createRunRepositoryClient({ provider: 'github' });

    expect(client).toBeInstanceOf(GitHubActionsClient);
    expect(client.name).toBe('github');
  });

  it('gitlab 未提供 token 時拋出錯誤', () => {
    expect(() => createRunRepositoryClient({ provider: 'gitlab', project: 'group/project' })).toThrow(
      '請提供 GitLab Personal Access Token（使用 --token 或設定環境變數 GITLAB_TOKEN）'
    );
  });

  it('gitlab 從專案 URL 推得 host，--host 優先', () => {
    const fromUrl = createRunRepositoryClient({
      provider: 'gitlab',
      token: 'test-token',
      project: 'https://gitlab.example.com/group/project',
    });
    createRunRepositoryClient({
      provider: 'gitlab',
      token: 'test-token',
      host: 'https://gitlab.internal',
      project: 'https://gitlab.example.com/group/project',
    });

    expect(fromUrl).toBeInstanceOf(GitLabPipelineClient);
    expect(gitlabHosts).toEqual(['https://gitlab.example.com', 'https://gitlab.internal']);
  });
});
