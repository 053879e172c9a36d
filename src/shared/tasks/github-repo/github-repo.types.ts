export interface RepoRef {
  owner: string;
  name: string;
}

export interface GithubRepoInput {
  repo: RepoRef;
  includeReleases: boolean;
  maxReleases: number;
}

export interface GithubRepoMetadata {
  name: string;
  fullName: string;
  description: string | null;
  language: string | null;
  stars: number;
  forks: number;
  openIssues: number;
  createdAt: string | null;
  updatedAt: string | null;
  cloneUrl: string | null;
  homepage: string | null;
  topics: string[];
  license: string | null;
}

export interface GithubRelease {
  tagName: string;
  name: string | null;
  publishedAt: string | null;
  prerelease: boolean;
  url: string | null;
}

export interface GithubRepoResult {
  repository: GithubRepoMetadata;
  releases?: GithubRelease[];
  fetchedAt: string;
}
