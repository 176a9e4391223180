/**
 * Node.js version check utility
 */

const MIN_NODE_VERSION = 20;

/**
 * Check if the current Node.js version meets minimum requirements.
 * Exits with a helpful error message if not.
 */
export function checkNodeVersion(): void {
    const currentVersion = process.versions.node;
    const majorVersion = parseInt(currentVersion.split('.')[0] ?? '0', 10);

    if (majorVersion < MIN_NODE_VERSION) {
        console.error(`
╔══════════════════════════════════════════════════════════════╗
║  Course Assistant requires Node.js ${MIN_NODE_VERSION} or higher               ║
╠══════════════════════════════════════════════════════════════╣
║  Current version: ${currentVersion.padEnd(43)}║
║  Required:        ${MIN_NODE_VERSION}.0.0 or higher${' '.repeat(26)}║
║                                                              ║
║  Please upgrade Node.js: https://nodejs.org                  ║
╚══════════════════════════════════════════════════════════════╝
`);
        process.exit(1);
    }
}
