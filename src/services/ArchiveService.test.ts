import assert from 'node:assert/strict'
import { mkdirSync, readdirSync, writeFileSync } from 'node:fs'
import { basename, join } from 'node:path'
import test from 'node:test'
import { ArchiveService, scratchArchivePath } from './ArchiveService'
import { LogService } from './LogService'
import { RemoteCommandError } from '../types/errors'
import { FakeRemote, createFakeSession } from '../../test/fakes/FakeRemote'
import { readTree, tempDir, writeTree } from '../../test/tree'

const SITE = {
  'index.html': '<h1>hello</h1>',
  'css/style.css': 'body { margin: 0 }',
  'img/deep/nested/logo.svg': '<svg/>'
}

function createService(log = new LogService()) {
  return new ArchiveService({ log, sessionId: 's1', tempDirectory: tempDir('archives') })
}

test('local compress then extract reproduces the folder', async () => {
  const source = tempDir('source')
  writeTree(join(source, 'site'), SITE)
  const archives = createService()

  const archivePath = await archives.compressLocal(join(source, 'site'))
  assert.match(basename(archivePath), /^site_[0-9a-f]{8}\.tar\.gz$/)

  const dest = tempDir('dest')
  await archives.extractLocal(archivePath, dest)
  assert.deepEqual(readdirSync(dest), ['site'])
  assert.deepEqual(readTree(join(dest, 'site')), readTree(join(source, 'site')))
})

test('extractLocal creates a missing destination', async () => {
  const source = tempDir('source')
  writeTree(join(source, 'docs'), { 'a.txt': 'a' })
  const archives = createService()
  const archivePath = await archives.compressLocal(join(source, 'docs'))

  const dest = join(tempDir('dest'), 'not', 'yet')
  await archives.extractLocal(archivePath, dest)
  assert.deepEqual(readTree(dest), { 'docs/a.txt': 'a' })
})

test('compressLocal rejects files and missing paths with LocalIOError', async () => {
  const dir = tempDir('source')
  const file = join(dir, 'notes.txt')
  writeFileSync(file, 'n')

  await assert.rejects(createService().compressLocal(file), {
    kind: 'LocalIOError',
    message: `Not a directory: ${file}`
  })
  await assert.rejects(createService().compressLocal(join(dir, 'missing')), { kind: 'LocalIOError' })
})

test('remote compress and extract run escaped tar commands', async (t) => {
  const remote = new FakeRemote()
  t.after(() => remote.dispose())
  remote.write("/srv/it's here/index.html", '<h1>hello</h1>')
  remote.write("/srv/it's here/css/style.css", 'body {}')
  mkdirSync(remote.local('/restore'))
  const session = createFakeSession(remote)
  const archives = createService()

  await archives.compressRemote(session, "/srv/it's here/", '/tmp/site.tar.gz')
  await archives.extractRemote(session, '/tmp/site.tar.gz', '/restore')

  assert.deepEqual(session.shell.commands, [
    "tar '-czf' '/tmp/site.tar.gz' '-C' '/srv' 'it'\\''s here'",
    "tar '-xzf' '/tmp/site.tar.gz' '-C' '/restore'"
  ])
  assert.deepEqual(readTree(remote.local('/restore')), {
    "it's here/css/style.css": 'body {}',
    "it's here/index.html": '<h1>hello</h1>'
  })
})

test('a failing remote tar raises RemoteCommandError with stderr', async (t) => {
  const remote = new FakeRemote()
  t.after(() => remote.dispose())
  const session = createFakeSession(remote, {
    intercept: (argv) =>
      argv[0] === 'tar' ? { exitCode: 2, stdout: '', stderr: 'tar: site: Cannot open: Permission denied\n' } : undefined
  })
  const log = new LogService()

  await assert.rejects(createService(log).compressRemote(session, '/srv/site', '/tmp/site.tar.gz'), (err: unknown) => {
    assert.ok(err instanceof RemoteCommandError)
    assert.equal(err.exitCode, 2)
    assert.equal(err.stderr, 'tar: site: Cannot open: Permission denied\n')
    assert.equal(err.message, 'Remote command failed with exit code 2: tar: site: Cannot open: Permission denied')
    return true
  })

  const [entry] = log.getEntries('s1')
  assert.equal(entry.level, 'error')
  assert.equal(entry.details, 'tar: site: Cannot open: Permission denied')
})

test('removeRemote reports failures instead of throwing', async (t) => {
  const remote = new FakeRemote()
  t.after(() => remote.dispose())
  remote.write('/tmp/old.tar.gz', 'x')
  const archives = createService()

  assert.deepEqual(await archives.removeRemote(createFakeSession(remote), '/tmp/old.tar.gz'), { ok: true })
  assert.equal(remote.exists('/tmp/old.tar.gz'), false)

  const denied = createFakeSession(remote, {
    intercept: () => ({ exitCode: 1, stdout: '', stderr: "rm: cannot remove '/tmp/x': Operation not permitted\n" })
  })
  assert.deepEqual(await archives.removeRemote(denied, '/tmp/x'), {
    ok: false,
    error: "rm: cannot remove '/tmp/x': Operation not permitted"
  })

  const offline = {
    sftp: denied.sftp,
    exec: () => Promise.reject(new Error('Not connected'))
  }
  assert.deepEqual(await archives.removeRemote(offline, '/tmp/x'), { ok: false, error: 'Not connected' })
})

test('scratch archive names are unique per call', () => {
  const first = scratchArchivePath('/tmp', 'site')
  const second = scratchArchivePath('/var/tmp/', 'site')
  assert.match(first, /^\/tmp\/site_\d+_[0-9a-f]{8}\.tar\.gz$/)
  assert.match(second, /^\/var\/tmp\/site_\d+_[0-9a-f]{8}\.tar\.gz$/)
  assert.notEqual(first, scratchArchivePath('/tmp', 'site'))
})
