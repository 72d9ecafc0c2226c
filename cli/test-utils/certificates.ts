/**
 * Self-signed certificates for https targets, generated with node-forge
 */
import forge from 'node-forge'

export interface CertificateCredentials {
  key: string
  cert: string
}

let cached: CertificateCredentials | undefined

/**
 * Certificate for localhost and 127.0.0.1, generated once per test run.
 */
export function generateCert(): CertificateCredentials {
  if (cached) return cached

  const pki = forge.pki
  const keys = pki.rsa.generateKeyPair(2048)
  const cert = pki.createCertificate()

  cert.publicKey = keys.publicKey
  cert.serialNumber = '01'
  cert.validity.notBefore = new Date()
  cert.validity.notAfter = new Date()
  cert.validity.notAfter.setFullYear(cert.validity.notBefore.getFullYear() + 1)

  const attrs = [{ name: 'commonName', value: 'localhost' }]
  cert.setSubject(attrs)
  cert.setIssuer(attrs)
  cert.setExtensions([
    { name: 'basicConstraints', cA: false },
    { name: 'keyUsage', digitalSignature: true, keyEncipherment: true },
    {
      name: 'subjectAltName',
      altNames: [
        { type: 2, value: 'localhost' }, // DNS
        { type: 7, ip: '127.0.0.1' },
      ],
    },
  ])
  cert.sign(keys.privateKey, forge.md.sha256.create())

  cached = {
    key: pki.privateKeyToPem(keys.privateKey),
    cert: pki.certificateToPem(cert),
  }
  return cached
}
