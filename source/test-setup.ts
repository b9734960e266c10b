import os from 'node:os';
import path from 'node:path';

// Ensure tests never write to real user data directories.
process.env['CODELOUPE_HOME'] =
	process.env['CODELOUPE_HOME'] ??
	path.join(os.tmpdir(), `codeloupe-test-home-${process.pid}`);
