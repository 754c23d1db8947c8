/**
 * Environment prober.
 *
 * WHY: Every command starts from a fresh snapshot of what actually exists.
 * Probing is read-only and never fails: anything that cannot be inspected
 * becomes a ProbeIssue and the corresponding field falls back to "absent",
 * so the diff engine always receives a usable snapshot.
 */

import { resolve } from 'node:path'

import {
  type DesiredState,
  type ObservedState,
  type ProbeIssue,
  type ProcessEnv,
  type ProviderDetection,
  type ProvisioningProvider,
  type StateMarker,
  dependencyFingerprint,
  errorMessage,
  getStatePath,
  logger,
  readStateJson,
} from '@envsync/core'

import { type EngineOptions, resolveProvider } from './context.js'

export type ProbeOptions = Omit<EngineOptions, 'desired'>

async function detectSafely(
  provider: ProvisioningProvider,
  projectRoot: string,
  desired: DesiredState,
  env: ProcessEnv | undefined
): Promise<ProviderDetection> {
  try {
    return await provider.detect({ projectRoot, desired, env })
  } catch (error) {
    // Providers should not throw from detect; degrade if one does
    return {
      runtimePresent: false,
      envExists: false,
      exportedVars: {},
      issues: [
        {
          subject: 'environment',
          message: `Provider ${provider.id} failed to inspect the environment: ${errorMessage(error)}`,
        },
      ],
    }
  }
}

async function readMarkerSafely(
  projectRoot: string,
  issues: ProbeIssue[]
): Promise<StateMarker | undefined> {
  const markerPath = getStatePath(projectRoot)
  let marker: StateMarker | undefined
  try {
    marker = await readStateJson(markerPath)
  } catch (error) {
    issues.push({ subject: 'marker', message: `${markerPath}: ${errorMessage(error)}` })
    return undefined
  }
  if (marker && resolve(marker.projectPath) !== resolve(projectRoot)) {
    issues.push({
      subject: 'marker',
      message: `${markerPath} belongs to ${marker.projectPath}; ignoring it`,
    })
    return undefined
  }
  return marker
}

/**
 * Take a snapshot of the project environment.
 */
export async function probe(
  projectRoot: string,
  desired: DesiredState,
  options: ProbeOptions = {}
): Promise<ObservedState> {
  const provider = resolveProvider(projectRoot, desired, options)
  const detection = await detectSafely(provider, projectRoot, desired, options.env)
  const issues: ProbeIssue[] = [...detection.issues]
  const marker = await readMarkerSafely(projectRoot, issues)

  const installed = detection.envExists ? detection.installedDependencies : undefined

  const observed: ObservedState = {
    runtimePresent: detection.runtimePresent,
    runtimeVersion: detection.runtimeVersion,
    runtimePath: detection.runtimePath,
    envExists: detection.envExists,
    envRuntimeVersion: detection.envExists ? detection.envRuntimeVersion : undefined,
    installedDependencies: installed
      ? Object.freeze(installed.map((dep) => ({ ...dep })))
      : undefined,
    installedFingerprint: installed ? dependencyFingerprint(installed) : undefined,
    exportedVars: Object.freeze(detection.envExists ? { ...detection.exportedVars } : {}),
    lastAppliedFingerprint: marker?.fingerprint,
    timestampOfLastApply: marker?.appliedAt,
    issues: Object.freeze(issues),
  }

  logger.debug('Probed environment', {
    projectRoot,
    provider: provider.id,
    envExists: observed.envExists,
    installedFingerprint: observed.installedFingerprint,
    issues: issues.length,
  })

  return Object.freeze(observed)
}
