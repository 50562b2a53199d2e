import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import { createMockLogger } from '@stepwise/core/test-utils';
import { FileSystemService } from './filesystem-service.js';
import { FileSystemErrorCode } from './error-codes.js';
import type { FileSystemConfig } from './types.js';

describe('FileSystemService', () => {
    let tempDir: string;

    const createService = (overrides: Partial<FileSystemConfig> = {}) =>
        new FileSystemService(
            {
                workingDirectory: tempDir,
                maxFileSize: 10 * 1024 * 1024,
                maxGlobResults: 1000,
                maxSearchResults: 100,
                ...overrides,
            },
            createMockLogger()
        );

    const writeFixture = async (relativePath: string, content: string) => {
        const target = path.join(tempDir, relativePath);
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, content);
        return target;
    };

    beforeEach(async () => {
        const rawTempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'stepwise-fs-test-'));
        tempDir = await fs.realpath(rawTempDir);
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    describe('readFile', () => {
        it('returns a 1-based line range and flags the rest as truncated', async () => {
            const target = await writeFixture('a.txt', 'one\ntwo\nthree\nfour');

            const result = await createService().readFile('a.txt', { offset: 2, limit: 2 });

            expect(result).toEqual({
                path: target,
                content: 'two\nthree',
                lines: 2,
                totalLines: 4,
                truncated: true,
                size: 18,
            });
        });

        it('reads the whole file without options', async () => {
            await writeFixture('a.txt', 'one\ntwo');

            const result = await createService().readFile('a.txt');

            expect(result.content).toBe('one\ntwo');
            expect(result.truncated).toBe(false);
        });

        it('reports missing files and directories', async () => {
            await fs.mkdir(path.join(tempDir, 'dir'));
            const service = createService();

            await expect(service.readFile('missing.txt')).rejects.toMatchObject({
                code: FileSystemErrorCode.FILE_NOT_FOUND,
            });
            await expect(service.readFile('dir')).rejects.toMatchObject({
                code: FileSystemErrorCode.NOT_A_FILE,
            });
        });

        it('refuses files above maxFileSize', async () => {
            const target = await writeFixture('big.txt', 'x'.repeat(11));

            await expect(createService({ maxFileSize: 10 }).readFile('big.txt')).rejects.toThrow(
                `File too large: ${target} is 11 bytes (max 10)`
            );
        });
    });

    describe('writeFile', () => {
        it('creates parent directories when asked and reports byte length', async () => {
            const service = createService();

            const first = await service.writeFile('nested/dir/b.txt', 'héllo', { createDirs: true });
            const second = await service.writeFile('nested/dir/b.txt', 'bye');

            expect(first).toEqual({
                path: path.join(tempDir, 'nested/dir/b.txt'),
                bytesWritten: 6,
                created: true,
            });
            expect(second.created).toBe(false);
            await expect(fs.readFile(second.path, 'utf-8')).resolves.toBe('bye');
        });

        it('fails when the parent directory is missing', async () => {
            await expect(createService().writeFile('absent/c.txt', 'x')).rejects.toMatchObject({
                code: FileSystemErrorCode.WRITE_FAILED,
            });
        });
    });

    describe('editFile', () => {
        it('replaces a unique match', async () => {
            const target = await writeFixture('code.ts', 'const a = 1;\nconst b = 2;\n');

            const result = await createService().editFile('code.ts', {
                oldString: 'a = 1',
                newString: 'a = 10',
            });

            expect(result.changesCount).toBe(1);
            expect(result.originalContent).toBe('const a = 1;\nconst b = 2;\n');
            await expect(fs.readFile(target, 'utf-8')).resolves.toBe(
                'const a = 10;\nconst b = 2;\n'
            );
        });

        it('rejects an ambiguous match unless replaceAll is set', async () => {
            const target = await writeFixture('dup.txt', 'foo foo');
            const service = createService();

            await expect(
                service.editFile('dup.txt', { oldString: 'foo', newString: 'bar' })
            ).rejects.toMatchObject({
                code: FileSystemErrorCode.STRING_NOT_UNIQUE,
                context: { occurrences: 2 },
            });
            await expect(fs.readFile(target, 'utf-8')).resolves.toBe('foo foo');

            const result = await service.editFile('dup.txt', {
                oldString: 'foo',
                newString: 'bar',
                replaceAll: true,
            });
            expect(result.changesCount).toBe(2);
            await expect(fs.readFile(target, 'utf-8')).resolves.toBe('bar bar');
        });

        it('reports a missing string', async () => {
            await writeFixture('a.txt', 'abc');

            await expect(
                createService().editFile('a.txt', { oldString: 'xyz', newString: '' })
            ).rejects.toMatchObject({ code: FileSystemErrorCode.STRING_NOT_FOUND });
        });

        it('inserts replacement patterns literally', async () => {
            const target = await writeFixture('a.txt', 'x');

            await createService().editFile('a.txt', { oldString: 'x', newString: '$&y' });

            await expect(fs.readFile(target, 'utf-8')).resolves.toBe('$&y');
        });
    });

    describe('globFiles', () => {
        beforeEach(async () => {
            await writeFixture('src/b.ts', '');
            await writeFixture('src/a.ts', '');
            await writeFixture('src/c.js', '');
            await writeFixture('node_modules/pkg/d.ts', '');
        });

        it('returns sorted absolute paths and skips node_modules', async () => {
            const result = await createService().globFiles('**/*.ts');

            expect(result).toEqual({
                files: [path.join(tempDir, 'src/a.ts'), path.join(tempDir, 'src/b.ts')],
                totalFound: 2,
                truncated: false,
            });
        });

        it('cuts the list at maxResults', async () => {
            const result = await createService().globFiles('*.ts', { cwd: 'src', maxResults: 1 });

            expect(result).toEqual({
                files: [path.join(tempDir, 'src/a.ts')],
                totalFound: 2,
                truncated: true,
            });
        });
    });

    describe('searchContent', () => {
        beforeEach(async () => {
            await writeFixture('src/a.ts', 'export const alpha = 1;\nconst beta = 2;\n');
            await writeFixture('src/b.ts', 'export function Alpha() {}\n');
            await writeFixture('notes.md', 'alpha notes\n');
        });

        it('matches line by line within the glob', async () => {
            const result = await createService().searchContent('alpha', { glob: '**/*.ts' });

            expect(result).toEqual({
                matches: [
                    {
                        file: path.join(tempDir, 'src/a.ts'),
                        lineNumber: 1,
                        line: 'export const alpha = 1;',
                    },
                ],
                filesSearched: 2,
                truncated: false,
            });
        });

        it('supports case-insensitive search', async () => {
            const result = await createService().searchContent('alpha', {
                glob: '**/*.ts',
                caseInsensitive: true,
            });

            expect(result.matches.map((match) => match.line)).toEqual([
                'export const alpha = 1;',
                'export function Alpha() {}',
            ]);
        });

        it('searches a single file when path points at one', async () => {
            const result = await createService().searchContent('alpha', { path: 'notes.md' });

            expect(result.matches).toEqual([
                { file: path.join(tempDir, 'notes.md'), lineNumber: 1, line: 'alpha notes' },
            ]);
            expect(result.filesSearched).toBe(1);
        });

        it('stops at maxResults and flags truncation', async () => {
            const result = await createService().searchContent('alpha', {
                caseInsensitive: true,
                maxResults: 1,
            });

            expect(result.matches).toEqual([
                { file: path.join(tempDir, 'notes.md'), lineNumber: 1, line: 'alpha notes' },
            ]);
            expect(result.truncated).toBe(true);
        });

        it('rejects invalid and catastrophic patterns', async () => {
            const service = createService();

            await expect(service.searchContent('(')).rejects.toMatchObject({
                code: FileSystemErrorCode.INVALID_PATTERN,
            });
            await expect(service.searchContent('(a+)+$')).rejects.toThrow(
                "Invalid search pattern '(a+)+$': pattern may cause catastrophic backtracking"
            );
        });

        it('reports a missing search path', async () => {
            await expect(
                createService().searchContent('alpha', { path: 'nowhere' })
            ).rejects.toMatchObject({ code: FileSystemErrorCode.FILE_NOT_FOUND });
        });

        it('stops when the signal is aborted', async () => {
            const controller = new AbortController();
            controller.abort();

            await expect(
                createService().searchContent('alpha', { signal: controller.signal })
            ).rejects.toThrow();
        });
    });
});
