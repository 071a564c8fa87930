import assert from 'node:assert/strict'
import { readdirSync, statSync, utimesSync, writeFileSync, readFileSync } from 'node:fs'
import { join } from 'node:path'
import test from 'node:test'
import { ArchiveService } from './ArchiveService'
import { LogService } from './LogService'
import { TransferEngine, type TransferEngineOptions } from './TransferEngine'
import type { ExecResult } from '../types/sftp'
import type { CleanupIssue } from '../types/transfer'
import {
  FakeRemote,
  createFakeSession,
  type FakeShellOptions,
  type LocalBackedFileSystemOptions
} from '../../test/fakes/FakeRemote'
import { readTree, tempDir, writeTree } from '../../test/tree'

const SITE = {
  'index.html': '<h1>hello</h1>',
  'css/style.css': 'body { margin: 0 }',
  'img/icons/logo.svg': '<svg/>'
}

const STAMP = new Date('2020-01-02T03:04:05Z')

function setup(
  options: FakeShellOptions & LocalBackedFileSystemOptions = {},
  overrides: Partial<TransferEngineOptions> = {}
) {
  const remote = new FakeRemote()
  const session = createFakeSession(remote, options)
  const log = new LogService()
  const staging = tempDir('staging')
  const engine = new TransferEngine(session, {
    sessionId: 's1',
    archives: new ArchiveService({ log, sessionId: 's1', tempDirectory: staging }),
    log,
    chunkSize: 1024,
    progressIntervalMs: 60_000,
    bandwidthLimitUp: 0,
    bandwidthLimitDown: 0,
    preserveTimestamps: true,
    scratchDirectory: '/tmp',
    ...overrides
  })
  const statuses: string[] = []
  const cleanups: CleanupIssue[] = []
  engine.on('status', (message: string) => statuses.push(message))
  engine.on('cleanup', (issue: CleanupIssue) => cleanups.push(issue))
  return { remote, session, engine, staging, statuses, cleanups }
}

function recorder() {
  const calls: Array<[number, number]> = []
  return { calls, onProgress: (done: number, total: number) => calls.push([done, total]) }
}

function assertMonotonic(calls: Array<[number, number]>, total: number): void {
  for (let i = 0; i < calls.length; i++) {
    assert.equal(calls[i][1], total)
    assert.ok(calls[i][0] <= total)
    if (i > 0) assert.ok(calls[i][0] >= calls[i - 1][0])
  }
}

const failTar = (flag: string): FakeShellOptions['intercept'] => (argv): ExecResult | undefined =>
  argv[0] === 'tar' && argv[1] === flag ? { exitCode: 2, stdout: '', stderr: 'tar: write error\n' } : undefined

test('uploadFile creates the directory, copies the bytes and keeps the timestamps', async (t) => {
  const { remote, engine } = setup()
  t.after(() => remote.dispose())
  const local = join(tempDir('local'), 'report.bin')
  writeFileSync(local, Buffer.alloc(5000, 7))
  utimesSync(local, STAMP, STAMP)
  const { calls, onProgress } = recorder()

  const remotePath = await engine.uploadFile(local, '/srv/upload/', onProgress)

  assert.equal(remotePath, '/srv/upload/report.bin')
  assert.deepEqual(readFileSync(remote.local(remotePath)), Buffer.alloc(5000, 7))
  assert.equal(statSync(remote.local(remotePath)).mtimeMs, STAMP.getTime())
  assert.deepEqual(calls.at(-1), [5000, 5000])
  assert.ok(calls.length <= 6)
  assertMonotonic(calls, 5000)
})

test('downloadFile copies the bytes and keeps the timestamps', async (t) => {
  const { remote, engine } = setup()
  t.after(() => remote.dispose())
  remote.write('/srv/data/notes.txt', 'remote notes')
  utimesSync(remote.local('/srv/data/notes.txt'), STAMP, STAMP)
  const localDir = join(tempDir('local'), 'incoming')
  const { calls, onProgress } = recorder()

  const localPath = await engine.downloadFile('/srv/data/notes.txt', localDir, onProgress)

  assert.equal(localPath, join(localDir, 'notes.txt'))
  assert.equal(readFileSync(localPath, 'utf-8'), 'remote notes')
  assert.equal(statSync(localPath).mtimeMs, STAMP.getTime())
  assert.deepEqual(calls.at(-1), [12, 12])
})

test('missing sources fail with the side they are on', async (t) => {
  const { remote, engine } = setup()
  t.after(() => remote.dispose())
  const noop = () => {}

  await assert.rejects(engine.uploadFile(join(tempDir('local'), 'nope.txt'), '/srv', noop), { kind: 'LocalIOError' })
  await assert.rejects(engine.downloadFile('/srv/missing.txt', tempDir('local'), noop), {
    kind: 'RemoteIOError',
    message: 'No such file: /srv/missing.txt'
  })
  remote.write('/srv/data/a.txt', 'a')
  await assert.rejects(engine.downloadFile('/srv/data', tempDir('local'), noop), {
    kind: 'RemoteIOError',
    message: 'Is a directory: /srv/data'
  })
})

test('cancelling mid-upload removes the partial file and leaves the session usable', async (t) => {
  const { remote, engine, cleanups } = setup()
  t.after(() => remote.dispose())
  const dir = tempDir('local')
  const local = join(dir, 'big.bin')
  writeFileSync(local, Buffer.alloc(10 * 1024, 1))
  const controller = new AbortController()
  const { calls } = recorder()

  await assert.rejects(
    engine.uploadFile(local, '/srv', (done, total) => {
      calls.push([done, total])
      if (done >= 4096) controller.abort()
    }, controller.signal),
    { kind: 'Cancelled' }
  )

  assert.equal(remote.exists('/srv/big.bin'), false)
  assert.deepEqual(cleanups, [])
  assert.ok(calls.every(([done, total]) => done <= total))

  const next = join(dir, 'small.txt')
  writeFileSync(next, 'small')
  assert.equal(await engine.uploadFile(next, '/srv', () => {}), '/srv/small.txt')
  assert.equal(remote.read('/srv/small.txt'), 'small')
})

test('cancelling mid-download removes the partial local file', async (t) => {
  const { remote, engine, cleanups } = setup({ readDelayMs: 5 })
  t.after(() => remote.dispose())
  remote.write('/srv/big.bin', Buffer.alloc(32 * 1024, 2))
  const localDir = tempDir('local')
  const controller = new AbortController()
  let reported = 0

  await assert.rejects(
    engine.downloadFile('/srv/big.bin', localDir, (done) => {
      reported = done
      if (done >= 4096) controller.abort()
    }, controller.signal),
    { kind: 'Cancelled' }
  )

  assert.ok(reported >= 4096 && reported < 32 * 1024)
  assert.deepEqual(readdirSync(localDir), [])
  assert.deepEqual(cleanups, [])
  assert.equal(remote.exists('/srv/big.bin'), true)
})

test('bandwidth limits pace uploads and downloads', async (t) => {
  const { remote, engine } = setup({}, { bandwidthLimitUp: 8, bandwidthLimitDown: 8 })
  t.after(() => remote.dispose())
  const local = join(tempDir('local'), 'paced.bin')
  writeFileSync(local, Buffer.alloc(4096, 5))
  const backDir = tempDir('back')

  // 4 KB at 8 KB/s takes half a second each way
  let startedAt = Date.now()
  await engine.uploadFile(local, '/srv', () => {})
  const uploadMs = Date.now() - startedAt

  startedAt = Date.now()
  await engine.downloadFile('/srv/paced.bin', backDir, () => {})
  const downloadMs = Date.now() - startedAt

  assert.ok(uploadMs >= 450, `upload took ${uploadMs}ms`)
  assert.ok(downloadMs >= 450, `download took ${downloadMs}ms`)
  assert.deepEqual(readFileSync(join(backDir, 'paced.bin')), Buffer.alloc(4096, 5))
})

test('an already aborted signal touches nothing', async (t) => {
  const { remote, engine } = setup()
  t.after(() => remote.dispose())
  const local = join(tempDir('local'), 'a.txt')
  writeFileSync(local, 'a')
  const controller = new AbortController()
  controller.abort()

  await assert.rejects(engine.uploadFile(local, '/srv/new', () => {}, controller.signal), { kind: 'Cancelled' })
  assert.equal(remote.exists('/srv/new'), false)
})

test('uploadFiles reports progress across all files', async (t) => {
  const { remote, engine, statuses } = setup()
  t.after(() => remote.dispose())
  const dir = tempDir('local')
  writeFileSync(join(dir, 'a.bin'), Buffer.alloc(3000, 1))
  writeFileSync(join(dir, 'b.bin'), Buffer.alloc(2000, 2))
  const { calls, onProgress } = recorder()

  const paths = await engine.uploadFiles([join(dir, 'a.bin'), join(dir, 'b.bin')], '/srv/batch', onProgress)

  assert.deepEqual(paths, ['/srv/batch/a.bin', '/srv/batch/b.bin'])
  assert.deepEqual(statuses, ['[1/2] Uploading a.bin...', '[2/2] Uploading b.bin...'])
  assert.deepEqual(calls.at(-1), [5000, 5000])
  assertMonotonic(calls, 5000)
})

test('downloadFiles fetches each file into one directory', async (t) => {
  const { remote, engine } = setup()
  t.after(() => remote.dispose())
  remote.write('/srv/a.txt', 'aaa')
  remote.write('/srv/sub/b.txt', 'bb')
  const localDir = tempDir('local')
  const { calls, onProgress } = recorder()

  await engine.downloadFiles(['/srv/a.txt', '/srv/sub/b.txt'], localDir, onProgress)

  assert.deepEqual(readTree(localDir), { 'a.txt': 'aaa', 'b.txt': 'bb' })
  assert.deepEqual(calls.at(-1), [5, 5])
})

test('uploadFolder with extraction leaves exactly the files and no archive', async (t) => {
  const { remote, session, engine, staging, statuses } = setup()
  t.after(() => remote.dispose())
  const local = tempDir('local')
  writeTree(join(local, 'site'), SITE)

  const result = await engine.uploadFolder(join(local, 'site'), '/srv/www', true, () => {})

  assert.equal(result, '/srv/www/site')
  assert.deepEqual(remote.list('/srv/www'), ['site'])
  assert.deepEqual(readTree(remote.local('/srv/www/site')), readTree(join(local, 'site')))
  assert.deepEqual(readdirSync(staging), [])

  const [extract, remove] = session.shell.commands
  assert.match(extract, /^tar '-xzf' '\/srv\/www\/site_[0-9a-f]{8}\.tar\.gz' '-C' '\/srv\/www'$/)
  assert.match(remove, /^rm '-f' '\/srv\/www\/site_[0-9a-f]{8}\.tar\.gz'$/)
  assert.equal(statuses[0], 'Compressing site...')
  assert.equal(statuses.at(-1), 'Removing remote archive...')
})

test('uploadFolder without extraction leaves one archive remotely', async (t) => {
  const { remote, engine, staging } = setup()
  t.after(() => remote.dispose())
  const local = tempDir('local')
  writeTree(join(local, 'site'), SITE)
  const { calls, onProgress } = recorder()

  const result = await engine.uploadFolder(join(local, 'site'), '/srv/www', false, onProgress)

  const names = remote.list('/srv/www')
  assert.equal(names.length, 1)
  assert.match(names[0], /^site_[0-9a-f]{8}\.tar\.gz$/)
  assert.equal(result, `/srv/www/${names[0]}`)
  assert.deepEqual(readdirSync(staging), [])
  const size = statSync(remote.local(result)).size
  assert.deepEqual(calls.at(-1), [size, size])
})

test('a failed remote extraction keeps the uploaded archive', async (t) => {
  const { remote, engine, staging } = setup({ intercept: failTar('-xzf') })
  t.after(() => remote.dispose())
  const local = tempDir('local')
  writeTree(join(local, 'site'), SITE)

  await assert.rejects(engine.uploadFolder(join(local, 'site'), '/srv/www', true, () => {}), {
    kind: 'RemoteCommandError',
    message: 'Remote command failed with exit code 2: tar: write error'
  })
  assert.equal(remote.list('/srv/www').filter((n) => n.endsWith('.tar.gz')).length, 1)
  assert.deepEqual(readdirSync(staging), [])
})

test('a cancel while the remote archive unpacks ends cancelled and removes the archive', async (t) => {
  const controller = new AbortController()
  const { remote, session, engine, statuses } = setup({
    intercept: (argv) => {
      if (argv[0] === 'tar' && argv[1] === '-xzf') controller.abort()
      return undefined
    }
  })
  t.after(() => remote.dispose())
  const local = tempDir('local')
  writeTree(join(local, 'site'), SITE)

  await assert.rejects(engine.uploadFolder(join(local, 'site'), '/srv/www', true, () => {}, controller.signal), {
    kind: 'Cancelled'
  })

  assert.deepEqual(remote.list('/srv/www'), ['site'])
  assert.match(session.shell.commands[1], /^rm '-f' '\/srv\/www\/site_[0-9a-f]{8}\.tar\.gz'$/)
  assert.ok(!statuses.includes('Removing remote archive...'))
})

test('downloadFolder without extraction leaves one archive locally and none in scratch', async (t) => {
  const { remote, engine } = setup()
  t.after(() => remote.dispose())
  for (const [path, content] of Object.entries(SITE)) {
    remote.write(`/srv/site/${path}`, content)
  }
  const localDir = tempDir('local')

  const archive = await engine.downloadFolder('/srv/site', localDir, false, () => {})

  const names = readdirSync(localDir)
  assert.equal(names.length, 1)
  assert.match(names[0], /^site_\d+_[0-9a-f]{8}\.tar\.gz$/)
  assert.equal(archive, join(localDir, names[0]))
  assert.deepEqual(remote.list('/tmp'), [])

  const check = tempDir('check')
  await new ArchiveService({ log: new LogService(), sessionId: 's1' }).extractLocal(archive, check)
  assert.deepEqual(readTree(join(check, 'site')), SITE)
})

test('downloadFolder with extraction leaves only the folder', async (t) => {
  const { remote, engine } = setup()
  t.after(() => remote.dispose())
  for (const [path, content] of Object.entries(SITE)) {
    remote.write(`/srv/site/${path}`, content)
  }
  const localDir = tempDir('local')

  const result = await engine.downloadFolder('/srv/site/', localDir, true, () => {})

  assert.equal(result, join(localDir, 'site'))
  assert.deepEqual(readdirSync(localDir), ['site'])
  assert.deepEqual(readTree(result), SITE)
  assert.deepEqual(remote.list('/tmp'), [])
})

test('a failed scratch cleanup is reported, not raised', async (t) => {
  const { remote, engine, cleanups } = setup({
    intercept: (argv) => (argv[0] === 'rm' ? { exitCode: 1, stdout: '', stderr: 'rm: Operation not permitted\n' } : undefined)
  })
  t.after(() => remote.dispose())
  remote.write('/srv/site/index.html', 'x')

  await engine.downloadFolder('/srv/site', tempDir('local'), true, () => {})

  assert.equal(cleanups.length, 1)
  assert.equal(cleanups[0].step, 'scratch-archive')
  assert.match(cleanups[0].path, /^\/tmp\/site_\d+_[0-9a-f]{8}\.tar\.gz$/)
  assert.equal(cleanups[0].message, 'rm: Operation not permitted')
})

test('cancelling between steps removes the scratch archive', async (t) => {
  const { remote, engine, statuses } = setup()
  t.after(() => remote.dispose())
  remote.write('/srv/site/index.html', 'x')
  const controller = new AbortController()
  engine.on('status', (message: string) => {
    if (message.startsWith('Downloading')) controller.abort()
  })
  const localDir = tempDir('local')

  await assert.rejects(engine.downloadFolder('/srv/site', localDir, true, () => {}, controller.signal), {
    kind: 'Cancelled'
  })
  assert.equal(statuses[0], 'Compressing /srv/site on the remote host...')
  assert.deepEqual(remote.list('/tmp'), [])
  assert.deepEqual(readdirSync(localDir), [])
})

test('the remote root cannot be archived', async (t) => {
  const { remote, engine } = setup()
  t.after(() => remote.dispose())

  await assert.rejects(engine.downloadFolder('/', tempDir('local'), false, () => {}), {
    kind: 'RemoteIOError',
    message: 'Cannot archive the root directory'
  })
})

test('a failed remote compression is a RemoteCommandError', async (t) => {
  const { remote, engine } = setup({ intercept: failTar('-czf') })
  t.after(() => remote.dispose())
  remote.write('/srv/site/index.html', 'x')

  await assert.rejects(engine.downloadFolder('/srv/site', tempDir('local'), false, () => {}), {
    kind: 'RemoteCommandError'
  })
  assert.deepEqual(remote.list('/tmp'), [])
})
