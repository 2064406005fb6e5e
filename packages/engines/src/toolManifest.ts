// packages/engines/src/toolManifest.ts

export type Platform = 'linux' | 'darwin' | 'win32';
export type Arch = 'x64' | 'arm64';

export type ToolArtifact = {
  platform: Platform;
  arch: Arch;
  url: string;
  sha256: string;
  /** binary/zip/tar.gz are unpacked into the cache; whl is pip-installed into a cache venv. */
  archiveType: 'binary' | 'zip' | 'tar.gz' | 'whl';
  binaryName: string;
};

export type ToolEntry = {
  name: string;
  version: string;
  artifacts: ToolArtifact[];
  /**
   * Installed with pip into a cache venv when no artifact matches the host.
   * Pinned by version; pip checks the index hashes.
   */
  pipPackage?: string;
  binaryName?: string;
};

export type ToolManifest = Record<string, ToolEntry>;

export const TOOL_MANIFEST: ToolManifest = {
  semgrep: {
    name: 'semgrep',
    version: '1.80.0',
    pipPackage: 'semgrep==1.80.0',
    binaryName: 'semgrep',
    artifacts: [
      {
        platform: 'linux',
        arch: 'x64',
        url: 'https://files.pythonhosted.org/packages/py3/s/semgrep/semgrep-1.80.0-cp38.cp39.cp310.cp311.py37.py38.py39.py310.py311-none-any.whl',
        sha256: '81f7bd39917f7f9019ebba15bab0c974af4fc1a9344eef328f3f9af12653de35',
        archiveType: 'whl',
        binaryName: 'semgrep',
      },
      {
        platform: 'darwin',
        arch: 'x64',
        url: 'https://files.pythonhosted.org/packages/py3/s/semgrep/semgrep-1.80.0-cp38.cp39.cp310.cp311.py37.py38.py39.py310.py311-none-macosx_10_14_x86_64.whl',
        sha256: 'e79c8d15d996db00952e631f1b4d4179cd91bf11d2c342e1ecf821f141e90cc1',
        archiveType: 'whl',
        binaryName: 'semgrep',
      },
      {
        platform: 'darwin',
        arch: 'arm64',
        url: 'https://files.pythonhosted.org/packages/py3/s/semgrep/semgrep-1.80.0-cp38.cp39.cp310.cp311.py37.py38.py39.py310.py311-none-macosx_11_0_arm64.whl',
        sha256: '125fff9620bc12393104aac09b981753495f38ddc7e33e639d2eeaaf1d4db069',
        archiveType: 'whl',
        binaryName: 'semgrep',
      },
      {
        platform: 'win32',
        arch: 'x64',
        url: 'https://files.pythonhosted.org/packages/py3/s/semgrep/semgrep-1.80.0-cp38.cp39.cp310.cp311.py37.py38.py39.py310.py311-none-any.whl',
        sha256: '81f7bd39917f7f9019ebba15bab0c974af4fc1a9344eef328f3f9af12653de35',
        archiveType: 'whl',
        binaryName: 'semgrep',
      },
    ],
  },
  gitleaks: {
    name: 'gitleaks',
    version: '8.24.2',
    binaryName: 'gitleaks',
    artifacts: [
      {
        platform: 'linux',
        arch: 'x64',
        url: 'https://github.com/gitleaks/gitleaks/releases/download/v8.24.2/gitleaks_8.24.2_linux_x64.tar.gz',
        sha256: 'fa0500f6b7e41d28791ebc680f5dd9899cd42b58629218a5f041efa899151a8e',
        archiveType: 'tar.gz',
        binaryName: 'gitleaks',
      },
      {
        platform: 'darwin',
        arch: 'x64',
        url: 'https://github.com/gitleaks/gitleaks/releases/download/v8.24.2/gitleaks_8.24.2_darwin_x64.tar.gz',
        sha256: 'bc3c46f8039ba716ba8461fa6745c9d1cfb90ca2f5f881d8d0cf66b7ba7b742c',
        archiveType: 'tar.gz',
        binaryName: 'gitleaks',
      },
      {
        platform: 'darwin',
        arch: 'arm64',
        url: 'https://github.com/gitleaks/gitleaks/releases/download/v8.24.2/gitleaks_8.24.2_darwin_arm64.tar.gz',
        sha256: '90d13686937ac7429b97a3acbf1e1d0ce90d92ae2d0cf46a690bd8ae5230bea0',
        archiveType: 'tar.gz',
        binaryName: 'gitleaks',
      },
      {
        platform: 'win32',
        arch: 'x64',
        url: 'https://github.com/gitleaks/gitleaks/releases/download/v8.24.2/gitleaks_8.24.2_windows_x64.zip',
        sha256: 'cc47fdc0364964e2d346fbbcbe4cc87f34d490b2647508fb05930d0ec2fbff07',
        archiveType: 'zip',
        binaryName: 'gitleaks.exe',
      },
    ],
  },
  bandit: {
    name: 'bandit',
    version: '1.7.10',
    artifacts: [],
    pipPackage: 'bandit==1.7.10',
    binaryName: 'bandit',
  },
};

export type ToolName = 'semgrep' | 'gitleaks' | 'bandit';

export function resolveToolArtifact(
  entry: ToolEntry,
  platform: string = process.platform,
  arch: string = process.arch
): ToolArtifact | undefined {
  return entry.artifacts.find((artifact) => artifact.platform === platform && artifact.arch === arch);
}

export function executableName(name: string, platform: string = process.platform): string {
  return platform === 'win32' && !name.toLowerCase().endsWith('.exe') ? `${name}.exe` : name;
}
