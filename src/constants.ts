export const APP_NAME = 'tunnelscope'

export const IPV6_PROBE_HOST = 'api6.ipify.org'
export const IPV6_PROBE_PORT = 443
export const IP_INFO_URL = 'https://ipinfo.io/json'
export const PING_TARGET = '1.1.1.1'

export const RESOLV_CONF_PATH = '/etc/resolv.conf'
export const WIREGUARD_NAME_DIR = '/var/run/wireguard'
export const SYS_NET_DIR = '/sys/class/net'

export const THROUGHPUT_HISTORY_SIZE = 60
