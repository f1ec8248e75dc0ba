/**
 * Shared fixtures for console tests: sample trees, a recording backend and a
 * terminal that captures output.
 */

import { ConfigTree, type ConfigNodeInit } from '@/console/data/ConfigTree';
import type { ConfigBackend, YangModuleInfo } from '@/console/shell/Session';
import type { Terminal } from '@/console/output/Pager';

export class CaptureTerminal implements Terminal {
  output = '';

  write(text: string): void {
    this.output += text;
  }

  take(): string {
    const out = this.output;
    this.output = '';
    return out;
  }
}

export class FakeBackend implements ConfigBackend {
  commits: Array<{ tree: ConfigTree; comment?: string }> = [];
  validations = 0;
  stateRequests: Array<string | undefined> = [];
  validateError?: string;
  commitError?: string;
  stateError?: string;
  state: ConfigTree = new ConfigTree();
  modules: YangModuleInfo[] = [];

  constructor(private readonly running: ConfigTree = new ConfigTree()) {}

  getRunningConfiguration(): ConfigTree {
    return this.running;
  }

  validateConfiguration(): void {
    this.validations++;
    if (this.validateError) throw new Error(this.validateError);
  }

  commitConfiguration(candidate: ConfigTree, comment?: string): void {
    if (this.commitError) throw new Error(this.commitError);
    this.commits.push({ tree: candidate, comment });
  }

  getState(xpath?: string): ConfigTree {
    this.stateRequests.push(xpath);
    if (this.stateError) throw new Error(this.stateError);
    return this.state;
  }

  listModules(): YangModuleInfo[] {
    return this.modules;
  }
}

function interfaceEntry(name: string, mtu: ConfigNodeInit): ConfigNodeInit {
  return {
    name: 'interface',
    kind: 'list',
    children: [{ name: 'name', kind: 'list-key', value: name }, mtu],
  };
}

/** interfaces/interface[eth0, eth1], each with a default mtu of 1500. */
export function interfacesTree(eth0Mtu?: string): ConfigTree {
  const eth0: ConfigNodeInit = eth0Mtu === undefined
    ? { name: 'mtu', kind: 'leaf', value: '1500', isDefault: true }
    : { name: 'mtu', kind: 'leaf', value: eth0Mtu };
  return ConfigTree.fromJSON([
    {
      name: 'interfaces',
      kind: 'np-container',
      children: [
        interfaceEntry('eth0', eth0),
        interfaceEntry('eth1', { name: 'mtu', kind: 'leaf', value: '1500', isDefault: true }),
      ],
    },
  ]);
}

/** system (presence) → hostname router1 */
export function systemTree(): ConfigTree {
  return ConfigTree.fromJSON([
    {
      name: 'system',
      kind: 'container',
      children: [{ name: 'hostname', kind: 'leaf', value: 'router1' }],
    },
  ]);
}

function leaves(values: Record<string, string>): ConfigNodeInit[] {
  return Object.entries(values).map(([name, value]) => ({ name, kind: 'leaf' as const, value }));
}

/** Routing state with one OSPFv2 instance and one static instance. */
export function ospfStateTree(secondIface = 'eth1'): ConfigTree {
  const eth0: ConfigNodeInit = {
    name: 'interface',
    kind: 'list',
    children: [
      { name: 'name', kind: 'list-key', value: 'eth0' },
      ...leaves({
        'interface-type': 'broadcast',
        state: 'dr',
        priority: '1',
        cost: '10',
        'hello-interval': '10',
        'hello-timer': '3',
        'dead-interval': '40',
      }),
      {
        name: 'neighbors',
        kind: 'np-container',
        children: [
          {
            name: 'neighbor',
            kind: 'list',
            children: [
              { name: 'neighbor-router-id', kind: 'list-key', value: '2.2.2.2' },
              ...leaves({ address: '10.0.0.2', state: 'full', 'dead-timer': '35' }),
              { name: 'statistics', kind: 'np-container', children: leaves({ 'state-changes': '4' }) },
            ],
          },
        ],
      },
    ],
  };
  const eth1: ConfigNodeInit = {
    name: 'interface',
    kind: 'list',
    children: [
      { name: 'name', kind: 'list-key', value: secondIface },
      ...leaves({
        'interface-type': 'point-to-point',
        state: 'point-to-point',
        priority: '1',
        cost: '20',
        'hello-interval': '10',
        'dead-interval': '40',
      }),
    ],
  };
  const nextHop = (iface: string, addr: string): ConfigNodeInit => ({
    name: 'next-hop',
    kind: 'list',
    children: leaves({ 'outgoing-interface': iface, 'next-hop': addr }),
  });

  return ConfigTree.fromJSON([
    {
      name: 'routing',
      kind: 'np-container',
      children: [
        {
          name: 'control-plane-protocols',
          kind: 'np-container',
          children: [
            {
              name: 'control-plane-protocol',
              kind: 'list',
              children: [
                { name: 'type', kind: 'list-key', value: 'ospfv2' },
                { name: 'name', kind: 'list-key', value: 'main' },
                {
                  name: 'ospf',
                  kind: 'np-container',
                  children: [
                    {
                      name: 'areas',
                      kind: 'np-container',
                      children: [
                        {
                          name: 'area',
                          kind: 'list',
                          children: [
                            { name: 'area-id', kind: 'list-key', value: '0.0.0.0' },
                            { name: 'interfaces', kind: 'np-container', children: [eth0, eth1] },
                          ],
                        },
                      ],
                    },
                    {
                      name: 'local-rib',
                      kind: 'np-container',
                      children: [
                        {
                          name: 'route',
                          kind: 'list',
                          children: [
                            { name: 'prefix', kind: 'list-key', value: '10.1.0.0/24' },
                            ...leaves({ metric: '20', 'route-type': 'intra-area' }),
                            {
                              name: 'next-hops',
                              kind: 'np-container',
                              children: [nextHop('eth0', '10.0.0.2'), nextHop(secondIface, '10.0.1.2')],
                            },
                          ],
                        },
                        {
                          name: 'route',
                          kind: 'list',
                          children: [
                            { name: 'prefix', kind: 'list-key', value: '10.2.0.0/24' },
                            ...leaves({ metric: '30', 'route-type': 'inter-area', 'route-tag': '100' }),
                            {
                              name: 'next-hops',
                              kind: 'np-container',
                              children: [nextHop('eth0', '10.0.0.2')],
                            },
                          ],
                        },
                      ],
                    },
                  ],
                },
              ],
            },
            {
              name: 'control-plane-protocol',
              kind: 'list',
              children: [
                { name: 'type', kind: 'list-key', value: 'static' },
                { name: 'name', kind: 'list-key', value: 'main' },
              ],
            },
          ],
        },
      ],
    },
  ]);
}
