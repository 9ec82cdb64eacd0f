export const CLI_USAGE_TEXT = `vpn-console - run an OpenVPN connection from the terminal

Usage:
  vpn-console list                      List imported configurations
  vpn-console import <file.ovpn>        Import a configuration and the files it references
  vpn-console connect <name> [--verbose]
                                        Connect with a configuration; Ctrl+C disconnects
  vpn-console history [--limit N]       Show recent sessions
  vpn-console --help                    Show this help

Environment:
  VPN_CONFIG_DIR      Where configurations are stored (default ~/.vpn-console/configs)
  OPENVPN_BINARY      VPN client binary (default openvpn)
  ELEVATION_COMMAND   Privilege wrapper (default pkexec)
  MANAGEMENT_PORT     Local management port (default 7505)
  LOG_LEVEL           trace | debug | info | warn | error | fatal (default warn)
`;
