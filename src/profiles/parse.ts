import { isIP } from 'node:net'

export type ParsedProfileConfig = {
  endpoint?: string
  dns?: string
  interfaceName?: string
}

const stripComment = (line: string) => line.replace(/[#;].*$/, '').trim()

const firstAddress = (list: string) =>
  list
    .split(',')
    .map((entry) => entry.trim())
    .find((entry) => isIP(entry) !== 0)

/** WireGuard `.conf`: `Endpoint` from the first [Peer], `DNS` from [Interface]. */
export const parseWireGuardConfig = (text: string): ParsedProfileConfig => {
  const parsed: ParsedProfileConfig = {}
  let section = ''
  for (const raw of text.split('\n')) {
    const line = stripComment(raw)
    const header = /^\[(\w+)\]$/.exec(line)
    if (header) {
      section = header[1].toLowerCase()
      continue
    }
    const pair = /^(\w+)\s*=\s*(.+)$/.exec(line)
    if (!pair) {
      continue
    }
    const key = pair[1].toLowerCase()
    const value = pair[2].trim()
    if (section === 'interface' && key === 'dns' && parsed.dns === undefined) {
      parsed.dns = firstAddress(value)
    }
    if (section === 'peer' && key === 'endpoint' && parsed.endpoint === undefined) {
      parsed.endpoint = value
    }
  }
  return parsed
}

/** OpenVPN `.ovpn`: `remote host [port]`, `dhcp-option DNS addr`, `dev tunN`. */
export const parseOpenVpnConfig = (text: string): ParsedProfileConfig => {
  const parsed: ParsedProfileConfig = {}
  for (const raw of text.split('\n')) {
    const [directive, ...args] = stripComment(raw).split(/\s+/)
    if (directive === 'remote' && args[0] && parsed.endpoint === undefined) {
      parsed.endpoint = args[1] ? `${args[0]}:${args[1]}` : args[0]
    }
    if (directive === 'dhcp-option' && args[0]?.toUpperCase() === 'DNS' && args[1] && parsed.dns === undefined) {
      parsed.dns = isIP(args[1]) !== 0 ? args[1] : undefined
    }
    if (directive === 'dev' && args[0] && args[0] !== 'tun' && args[0] !== 'tap') {
      parsed.interfaceName = args[0]
    }
  }
  return parsed
}
