import { ReviewCommands } from "./commands.js";
import { loadConfigFile, resolveConfig } from "./config.js";
import { GitDiffSource, defaultBaseRef, getGitDir, getRemoteUrl, revParse } from "./git.js";
import { getReviewsDir, loadEnv } from "./paths.js";
import { FileSessionStore } from "./store.js";

/** Wires the commands to git, the config files and the session files of the repository at `repoRoot`. */
export async function createReviewCommands(
  repoRoot: string,
  options: { log?: (message: string) => void } = {},
): Promise<ReviewCommands> {
  await loadEnv(repoRoot);
  return new ReviewCommands({
    repoRoot,
    store: new FileSessionStore(async (root) => getReviewsDir(await getGitDir(root))),
    diffs: new GitDiffSource(repoRoot),
    refs: {
      defaultBase: () => defaultBaseRef(repoRoot),
      resolveCommit: (ref) => revParse(repoRoot, ref),
    },
    loadConfig: async () =>
      resolveConfig({
        file: await loadConfigFile(repoRoot),
        env: process.env,
        remoteUrl: await getRemoteUrl(repoRoot),
      }),
    log: options.log,
  });
}
