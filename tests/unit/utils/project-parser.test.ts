/**
 * 專案識別解析單元測試
 */

import { describe, it, expect } from 'vitest';
import { parseGitHubRepository, parseGitLabProject } from '../../../src/utils/project-parser.js';
import { AppError } from '../../../src/models/error.js';

describe('parseGitHubRepository', () => {
  it('解析 owner/name', () => {
    expect(parseGitHubRepository('octo-org/octo-repo')).toEqual({ owner: 'octo-org', repo: 'octo-repo' });
  });

  it('解析完整 URL 並去除 .git 後綴', () => {
    expect(parseGitHubRepository('https://github.com/octo-org/octo-repo.git')).toEqual({
      owner: 'octo-org',
      repo: 'octo-repo',
    });
  });

  it('去除前後空白', () => {
    expect(parseGitHubRepository('  octo-org/octo-repo  ')).toEqual({ owner: 'octo-org', repo: 'octo-repo' });
  });

  it('空字串拋出錯誤', () => {
    expect(() => parseGitHubRepository('   ')).toThrow('專案識別不可為空');
  });

  it.each(['octo-repo', 'a/b/c', 'octo org/repo'])('拒絕無效格式 %s', (input) => {
    expect(() => parseGitHubRepository(input)).toThrow(AppError);
  });
});

describe('parseGitLabProject', () => {
  it('數字 ID 保持字串格式', () => {
    expect(parseGitLabProject('12345')).toEqual({ identifier: '12345' });
  });

  it('支援多層子群組路徑', () => {
    expect(parseGitLabProject('group/sub/project')).toEqual({ identifier: 'group/sub/project' });
  });

  it('從 URL 解析 host 與路徑', () => {
    expect(parseGitLabProject('https://gitlab.example.com/group/project')).toEqual({
      identifier: 'group/project',
      host: 'https://gitlab.example.com',
    });
  });

  it('單一名稱拋出錯誤', () => {
    expect(() => parseGitLabProject('project')).toThrow('無效的專案識別格式：project');
  });
});
