import { UnsupportedVersionError } from "sdui-shared";
import type { FallbackElement } from "../renderer/elements";

export const MIN_SUPPORTED_VERSION = 1;
export const MAX_SUPPORTED_VERSION = 3;

const COMPATIBILITY_MODES: Readonly<Record<number, string>> = {
  1: "Basic components only",
  2: "Added images and conditionals",
  3: "Form inputs and styling",
};

/**
 * Screen-level version gate. A screen outside the supported range renders as
 * a single fallback view: its structure may be incompatible throughout, so no
 * node of it is attempted.
 */
export class VersionManager {
  constructor(
    readonly minSupported: number = MIN_SUPPORTED_VERSION,
    readonly maxSupported: number = MAX_SUPPORTED_VERSION,
  ) {}

  isVersionSupported(version: number): boolean {
    return (
      Number.isInteger(version) && version >= this.minSupported && version <= this.maxSupported
    );
  }

  compatibilityMode(version: number): string {
    return COMPATIBILITY_MODES[version] ?? "Unsupported version";
  }

  unsupported(version: number): UnsupportedVersionError {
    return new UnsupportedVersionError(version, this.minSupported, this.maxSupported);
  }

  fallbackElement(version: number): FallbackElement {
    const tooNew = version > this.maxSupported;
    return {
      kind: "fallback",
      icon: "arrow.triangle.2.circlepath",
      title: "Update Required",
      message: tooNew
        ? `This screen needs schema version ${version}, but this app supports up to version ${this.maxSupported}.`
        : `This screen uses schema version ${version}, which this app no longer supports.`,
      guidance: tooNew
        ? "Update the app to the latest version to view this screen."
        : `Ask your administrator to republish this screen for version ${this.minSupported}-${this.maxSupported}.`,
      version,
      minSupported: this.minSupported,
      maxSupported: this.maxSupported,
    };
  }
}

/**
 * `1 ≤ version ≤ MAX_SUPPORTED_VERSION`, integers only.
 */
export function isVersionSupported(version: number): boolean {
  return new VersionManager().isVersionSupported(version);
}
