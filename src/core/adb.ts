import type {ToolInvocation} from '../engine/types.js'
import {toolCall, type ToolLocator} from './tool-locator.js'

/** Intent category monkey launches through. */
export const launcherCategory = 'android.intent.category.LAUNCHER'

export type AdbOptions = {
  /** Serial of the target device; adb picks the only device when absent */
  deviceId?: string;
  timeoutSec?: number;
}

/**
 * Builds the adb invocations the workflows run. Every invocation targets
 * the same device.
 */
export class AdbCommands {
  constructor(
    private readonly tools: ToolLocator,
    private readonly options: AdbOptions = {}
  ) {}

  get deviceId(): string | undefined {
    return this.options.deviceId
  }

  /** Removes a package. A non-zero exit is returned, not raised. */
  uninstall(packageName: string): () => Promise<ToolInvocation> {
    return this.call(['uninstall', packageName], {check: false})
  }

  install(apkPath: string, {replace = false}: {replace?: boolean} = {}): () => Promise<ToolInvocation> {
    return this.call(replace ? ['install', '-r', apkPath] : ['install', apkPath])
  }

  /** Starts the launcher activity of a package with one monkey event. */
  launch(packageName: string): () => Promise<ToolInvocation> {
    return this.call(['shell', 'monkey', '-p', packageName, '-c', launcherCategory, '1'])
  }

  /** Runs `id` as root; fails when the device grants no root shell. */
  rootCheck(): () => Promise<ToolInvocation> {
    return this.call(['shell', 'su', '-c', 'id'])
  }

  /** Prints a file as root. */
  readFile(devicePath: string): () => Promise<ToolInvocation> {
    return this.call(['shell', 'su', '-c', `'cat ${devicePath}'`])
  }

  private call(args: readonly string[], options: {check?: boolean} = {}): () => Promise<ToolInvocation> {
    const device = this.options.deviceId ? ['-s', this.options.deviceId] : []
    return toolCall(this.tools, 'adb', [...device, ...args], {timeoutSec: this.options.timeoutSec, ...options})
  }
}
