import assert from 'node:assert/strict'
import { mkdtempSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import test from 'node:test'
import { HostKeyStore } from './HostKeyStore'
import { createHostVerifier, describeHostKey, fingerprintKey, readKeyType } from './hostKeyVerifier'
import { LogService } from './LogService'
import type { HostKeyPolicy } from '../types/hostkey'
import type { HostKeyPrompt } from '../types/session'
import { sshKey } from '../../test/keys'

const KEY = sshKey('ssh-ed25519', 7)
const ROTATED = sshKey('ssh-ed25519', 8)

function createStore(): HostKeyStore {
  return new HostKeyStore({ cwd: mkdtempSync(join(tmpdir(), 'sftp-ferry-verifier-')) })
}

function check(store: HostKeyStore, policy: HostKeyPolicy, key: Buffer, prompt?: HostKeyPrompt) {
  const log = new LogService()
  const verification = createHostVerifier({ host: 'files.test', port: 22, policy, store, prompt, log, sessionId: 's1' })
  const answers: boolean[] = []
  verification.verifier(key, (valid) => answers.push(valid))
  return { answers, rejection: verification.rejection(), log }
}

test('fingerprints use the OpenSSH SHA256 form', () => {
  assert.match(fingerprintKey(KEY), /^SHA256:[A-Za-z0-9+/]{43}$/)
  assert.notEqual(fingerprintKey(KEY), fingerprintKey(ROTATED))
  assert.equal(readKeyType(KEY), 'ssh-ed25519')
  assert.equal(readKeyType(Buffer.from([0, 0])), 'unknown')

  const info = describeHostKey('files.test', 2222, KEY)
  assert.equal(info.port, 2222)
  assert.equal(info.publicKeyBase64, KEY.toString('base64'))
})

test('strict rejects unknown keys', () => {
  const store = createStore()
  const { answers, rejection } = check(store, 'strict', KEY)
  assert.deepEqual(answers, [false])
  assert.equal(rejection?.reason, 'unknown')
  assert.equal(rejection?.kind, 'UntrustedHost')
  assert.equal(store.getAll().length, 0)
})

test('accept-new trusts the first key and rejects a changed one', () => {
  const store = createStore()
  assert.deepEqual(check(store, 'accept-new', KEY).answers, [true])
  assert.equal(store.getAll().length, 1)

  assert.deepEqual(check(store, 'accept-new', KEY).answers, [true])

  const changed = check(store, 'accept-new', ROTATED)
  assert.deepEqual(changed.answers, [false])
  assert.equal(changed.rejection?.reason, 'changed')
  assert.equal(changed.rejection?.hostKey.fingerprint, fingerprintKey(ROTATED))
  assert.equal(store.getAll().length, 1)
})

test('accept-any accepts a changed key without storing it and warns', () => {
  const store = createStore()
  check(store, 'accept-new', KEY)

  const { answers, rejection, log } = check(store, 'accept-any', ROTATED)
  assert.deepEqual(answers, [true])
  assert.equal(rejection, null)
  assert.equal(store.getAll().length, 1)
  assert.equal(log.getEntries('s1')[0].level, 'warning')
})

test('ask offers unknown keys to the prompt', () => {
  const store = createStore()
  let offered = ''
  const accepted = check(store, 'ask', KEY, (info, accept) => {
    offered = info.fingerprint
    accept()
  })
  assert.deepEqual(accepted.answers, [true])
  assert.equal(offered, fingerprintKey(KEY))
  assert.equal(store.getAll().length, 1)

  const declined = check(createStore(), 'ask', KEY, (_info, _accept, reject) => reject())
  assert.deepEqual(declined.answers, [false])
  assert.equal(declined.rejection?.reason, 'unknown')
})

test('ask without a prompt rejects', () => {
  const { answers, rejection } = check(createStore(), 'ask', KEY)
  assert.deepEqual(answers, [false])
  assert.equal(rejection?.reason, 'unknown')
})

test('ask never offers a changed key', () => {
  const store = createStore()
  check(store, 'accept-new', KEY)
  let prompted = false
  const { answers } = check(store, 'ask', ROTATED, (_info, accept) => {
    prompted = true
    accept()
  })
  assert.deepEqual(answers, [false])
  assert.equal(prompted, false)
})

test('the verifier answers once even when the prompt answers twice', () => {
  const { answers } = check(createStore(), 'ask', KEY, (_info, accept, reject) => {
    accept()
    reject()
    accept()
  })
  assert.deepEqual(answers, [true])
})
