// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export type EnvSettings = Record<string, string | undefined>;

/**
 * Retrieve a setting from environment variables
 * @param env environment variables
 * @param key setting key
 * @param keySuffix additional suffix to add to key
 * @param defaultValue default value of setting
 * @param requireSuffix if true, do not fall back to the key without suffix
 */
export function getEnvSetting(
    env: EnvSettings,
    key: string,
    keySuffix?: string,
    defaultValue?: string,
    requireSuffix: boolean = false,
): string {
    const envKey = keySuffix ? key + "_" + keySuffix : key;
    let value = env[envKey] ?? defaultValue;
    if (value === undefined && keySuffix) {
        if (!requireSuffix) {
            // Fallback to key without the suffix
            value = env[key];
        }
    }
    if (value === undefined) {
        throw new Error(`Missing ApiSetting: ${key}`);
    }
    return value;
}

/**
 * Returns true if the given environment setting/key is available
 */
export function hasEnvSettings(
    env: EnvSettings,
    key: string,
    keySuffix?: string | undefined,
): boolean {
    const envKey = keySuffix ? key + "_" + keySuffix : key;
    const setting = env[envKey];
    return setting !== undefined && setting.length > 0;
}

/**
 * Read a positive integer setting
 * @returns defaultValue if the setting is absent or empty
 */
export function getIntFromEnv(
    env: EnvSettings,
    envName: string,
    endpointName?: string,
    defaultValue?: number | undefined,
): number | undefined {
    const numString = getEnvSetting(env, envName, endpointName, "");
    if (!numString) {
        return defaultValue;
    }
    const num = parseInt(numString);
    if (num.toString() !== numString || num <= 0) {
        throw new Error(`Invalid value for ${envName}: ${numString}`);
    }
    return num;
}
