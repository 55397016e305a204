export { gitExec, gitExecLines, gitExecStdout } from './exec.js'
export type { GitExecOptions, GitExecResult } from './exec.js'

export {
  archiveCommit,
  ensureBareRepo,
  fetchRefs,
  listFiles,
  revParseCommit,
  showFile,
  showFileOrNull,
} from './repo.js'
export type { RepoOptions } from './repo.js'
