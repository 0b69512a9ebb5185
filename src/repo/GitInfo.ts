import simpleGit from 'simple-git';
import logger from '../utils/logger';

export interface GitHead {
    commitId?: string;
    branchName?: string;
}

/**
 * Commit and branch of the working tree's HEAD; empty outside a repository
 */
export async function readGitHead(repoPath: string): Promise<GitHead> {
    try {
        const git = simpleGit(repoPath);
        if (!(await git.checkIsRepo())) {
            return {};
        }

        const commitId = (await git.revparse(['HEAD'])).trim();
        const branch = (await git.revparse(['--abbrev-ref', 'HEAD'])).trim();

        const head: GitHead = {};
        if (commitId) head.commitId = commitId;
        // detached HEAD reports "HEAD"
        if (branch && branch !== 'HEAD') head.branchName = branch;
        return head;
    } catch (error) {
        logger.debug(`Git metadata unavailable for ${repoPath}: ${error instanceof Error ? error.message : String(error)}`);
        return {};
    }
}
