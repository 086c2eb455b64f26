import * as fs from 'fs/promises';
import * as path from 'path';
import { OUTPUT } from '../../application/config/HarvestDefaults';

export type ScriptPlatform = 'windows' | 'unix';

export interface IdmScriptOptions {
  /** Path to the IDM executable */
  idmPath: string;
  /** Directory where IDM should save downloads */
  downloadDir: string;
  /** Links file read by the script, relative to the script's directory */
  linksFile?: string;
}

export function detectPlatform(platform: NodeJS.Platform = process.platform): ScriptPlatform {
  return platform === 'win32' ? 'windows' : 'unix';
}

/**
 * Escapes a value for a `set "NAME=value"` line in a batch file.
 * Double quotes cannot appear in Windows paths and are dropped.
 */
export function escapeBatchValue(value: string): string {
  return value.replace(/"/g, '').replace(/%/g, '%%');
}

/**
 * Escapes a value for a double-quoted bash string.
 */
export function escapeBashValue(value: string): string {
  return value.replace(/[\\"$`]/g, match => `\\${match}`);
}

export function renderWindowsScript(options: IdmScriptOptions): string {
  const linksFile = options.linksFile ?? OUTPUT.LINKS_FILE;
  const lines = [
    '@echo off',
    'echo IDM Link Enqueue Script',
    'echo ----------------------',
    '',
    'cd /d "%~dp0"',
    `set "IDM_PATH=${escapeBatchValue(options.idmPath)}"`,
    `set "DOWNLOAD_DIR=${escapeBatchValue(options.downloadDir)}"`,
    '',
    'if not exist "%IDM_PATH%" (',
    '    echo IDM executable not found at %IDM_PATH%',
    '    echo Please edit this script with the correct path to IDMan.exe',
    '    pause',
    '    exit /b 1',
    ')',
    '',
    'echo Adding links to IDM queue...',
    `for /f "usebackq delims=" %%u in ("${escapeBatchValue(linksFile)}") do (`,
    '    echo Adding: %%u',
    '    "%IDM_PATH%" /d "%%u" /p "%DOWNLOAD_DIR%" /n /a',
    '    timeout /t 1 /nobreak >nul',
    ')',
    '',
    'echo All links have been added to IDM queue.',
    'echo Remember to start IDM to begin downloads.',
    'pause',
  ];
  return lines.join('\r\n') + '\r\n';
}

export function renderUnixScript(options: IdmScriptOptions): string {
  const linksFile = options.linksFile ?? OUTPUT.LINKS_FILE;
  const lines = [
    '#!/bin/bash',
    '',
    'echo "IDM Link Enqueue Script"',
    'echo "----------------------"',
    '',
    'cd "$(dirname "$0")" || exit 1',
    '',
    `IDM_PATH="${escapeBashValue(options.idmPath)}"`,
    `DOWNLOAD_DIR="${escapeBashValue(options.downloadDir)}"`,
    '',
    'if [ ! -f "$IDM_PATH" ]; then',
    '    echo "IDM executable not found at $IDM_PATH"',
    '    echo "Please edit this script with the correct path to IDMan"',
    '    exit 1',
    'fi',
    '',
    'echo "Adding links to IDM queue..."',
    '',
    'while IFS= read -r url || [ -n "$url" ]; do',
    '    [ -z "$url" ] && continue',
    '    echo "Adding: $url"',
    '    "$IDM_PATH" /d "$url" /p "$DOWNLOAD_DIR" /n /a',
    '    sleep 1',
    `done < "${escapeBashValue(linksFile)}"`,
    '',
    'echo "All links have been added to IDM queue."',
    'echo "Remember to start IDM to begin downloads."',
  ];
  return lines.join('\n') + '\n';
}

/**
 * Writes the platform-specific script that enqueues links.txt in
 * Internet Download Manager.
 */
export class IdmScriptWriter {
  constructor(private readonly platform: ScriptPlatform = detectPlatform()) {}

  get scriptName(): string {
    return this.platform === 'windows' ? OUTPUT.WINDOWS_SCRIPT : OUTPUT.UNIX_SCRIPT;
  }

  render(options: IdmScriptOptions): string {
    return this.platform === 'windows' ? renderWindowsScript(options) : renderUnixScript(options);
  }

  /**
   * Writes the script into `outputDir` and returns its path.
   */
  async write(outputDir: string, options: IdmScriptOptions): Promise<string> {
    await fs.mkdir(outputDir, { recursive: true });
    const scriptPath = path.join(outputDir, this.scriptName);
    await fs.writeFile(scriptPath, this.render(options), 'utf-8');
    if (this.platform === 'unix') {
      await fs.chmod(scriptPath, 0o755);
    }
    return scriptPath;
  }
}
