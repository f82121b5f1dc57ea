import {mkdir} from 'node:fs/promises'
import {join} from 'node:path'
import type {ToolRunner} from '../engine/executor.js'
import {FileLock, type FileLockOptions} from '../engine/file-lock.js'
import {isRegularFile} from '../engine/resolvers.js'
import {SignError} from '../errors.js'
import type {KeystoreSettings} from './config.js'
import type {PipelineRun} from './pipeline-run.js'
import {toolCall, type ToolLocator} from './tool-locator.js'

/**
 * Keystore file, key alias and the two passwords used by the signer.
 */
export type SigningIdentity = {
  keystore: string;
  alias: string;
  storePassword: string;
  keyPassword: string;
}

export type ProvisionedIdentity = {
  identity: SigningIdentity;
  /** True when the keystore file was created by this call */
  generated: boolean;
}

/**
 * Provides the self-signed debug identity used when the caller supplies
 * none.
 *
 * The keystore lives at a fixed, configurable location and is reused across
 * runs. Creation is check-then-create under an exclusive lock file, so two
 * processes provisioning it for the first time never both run keytool.
 */
export class DebugKeystoreProvider {
  constructor(
    private readonly runner: ToolRunner,
    private readonly tools: ToolLocator,
    private readonly settings: KeystoreSettings,
    private readonly lockOptions: FileLockOptions = {}
  ) {}

  get keystorePath(): string {
    return join(this.settings.dir, this.settings.fileName)
  }

  get identity(): SigningIdentity {
    return {
      keystore: this.keystorePath,
      alias: this.settings.alias,
      storePassword: this.settings.storePassword,
      keyPassword: this.settings.keyPassword
    }
  }

  /**
   * Returns the debug identity, generating the keystore on first use.
   * @param run - Pipeline run the generation is reported under
   * @throws {SignError} If keytool is missing or fails
   */
  async provision(run: PipelineRun, timeoutSec?: number): Promise<ProvisionedIdentity> {
    const ref = {id: 'keystore', displayName: 'Provision debug keystore'}
    await mkdir(this.settings.dir, {recursive: true})

    const lock = await FileLock.acquire(`${this.keystorePath}.lock`, this.lockOptions)
    try {
      if (await isRegularFile(this.keystorePath)) {
        run.skip(ref, 'existing')
        return {identity: this.identity, generated: false}
      }

      const fail = (cause: unknown) => new SignError('Failed to generate debug keystore', {stage: ref.id, tool: 'keytool', artifact: this.keystorePath, cause})
      await run.runStage(this.runner, {
        ref,
        invocation: toolCall(this.tools, 'keytool', [
          '-genkey',
          '-v',
          '-keystore',
          this.keystorePath,
          '-alias',
          this.settings.alias,
          '-keyalg',
          this.settings.keyAlgorithm,
          '-keysize',
          String(this.settings.keySize),
          '-validity',
          String(this.settings.validityDays),
          '-storepass',
          this.settings.storePassword,
          '-keypass',
          this.settings.keyPassword,
          '-dname',
          this.settings.distinguishedName
        ], {timeoutSec}),
        artifact: {path: this.keystorePath, kind: 'file'}
      }, fail)

      return {identity: this.identity, generated: true}
    } finally {
      await lock.release()
    }
  }
}
