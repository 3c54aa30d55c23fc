import { CliCodeGenerator } from "./ai.js";
import { Assistant } from "./assistant.js";
import { DirectoryDeployer } from "./collaborators/deployer.js";
import { ProcessTestRunner } from "./collaborators/test-runner.js";
import { CodeManager } from "./managers/code-manager.js";
import { DeploymentManager } from "./managers/deployment-manager.js";
import { ProjectManager } from "./managers/project-manager.js";
import { TestManager } from "./managers/test-manager.js";
import { CommandRouter } from "./router.js";
import { SessionContext } from "./session/context.js";
import type { CodeGenerator, Deployer, StatusCallback, TestRunner, VoxdevConfig } from "./types.js";
import { FsWorkspaceStore } from "./workspace/fs-store.js";
import type { WorkspaceStore } from "./workspace/workspace-store.js";

export interface RuntimeOverrides {
  store?: WorkspaceStore;
  generator?: CodeGenerator;
  testRunner?: TestRunner;
  deployer?: Deployer;
  onStatus?: StatusCallback;
  now?: () => Date;
}

export interface Runtime {
  config: VoxdevConfig;
  store: WorkspaceStore;
  context: SessionContext;
  router: CommandRouter;
  assistant: Assistant;
}

/** Wires one session: a store, its managers and collaborators, a router and a fresh context. */
export function createRuntime(config: VoxdevConfig, overrides: RuntimeOverrides = {}): Runtime {
  const now = overrides.now ?? (() => new Date());
  const onStatus = overrides.onStatus;
  const store = overrides.store ?? new FsWorkspaceStore(config.root, { now });
  const generator =
    overrides.generator ??
    new CliCodeGenerator({
      provider: config.ai.provider,
      model: config.ai.model,
      timeoutMs: config.ai.timeoutMs,
      onStatus
    });
  const testRunner =
    overrides.testRunner ?? new ProcessTestRunner({ command: config.tests.command, timeoutMs: config.tests.timeoutMs, onStatus });
  const deployer = overrides.deployer ?? new DirectoryDeployer(config.root, { now, onStatus });

  const router = new CommandRouter({
    project: new ProjectManager(store),
    code: new CodeManager(store, generator),
    test: new TestManager(store, testRunner, generator),
    deployment: new DeploymentManager(store, deployer, config.deployments)
  });
  const context = new SessionContext(now);
  const assistant = new Assistant(router, context, { wakePhrase: config.wakePhrase });
  return { config, store, context, router, assistant };
}
