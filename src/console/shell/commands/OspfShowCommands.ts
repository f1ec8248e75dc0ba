/**
 * OspfShowCommands - "show ospf ..." commands over the OSPFv2 state tree
 *
 * Read-only consumers of the tree accessors: fetch the routing state once,
 * walk instances → areas → interfaces → neighbors and print a table or a
 * detail listing.
 */

import { childOptValue, childValue, findNodes } from '../../data/accessors';
import type { ConfigTree, NodeId } from '../../data/ConfigTree';
import { Table } from '../../output/Table';
import type { Commands } from '../Commands';
import type { CommandAction } from '../CommandTrie';
import type { Session } from '../Session';
import { getOptArg, pageOrFail, pageTableOrFail } from './InternalCommands';

const XPATH_REQ = '/routing/control-plane-protocols';
const XPATH_INSTANCE = "routing/control-plane-protocols/control-plane-protocol[type='ospfv2']";
const XPATH_AREA = 'ospf/areas/area';
const XPATH_IFACE = 'interfaces/interface';
const XPATH_NBR = 'neighbors/neighbor';
const XPATH_RIB = 'ospf/local-rib/route';
const XPATH_NEXTHOP = 'next-hops/next-hop';

/** Containers whose leaves are listed in detail output. */
const DETAIL_GROUPS = new Set(['statistics', 'graceful-restart']);

interface InterfaceVisit {
  instance: string;
  area: string;
  iface: NodeId;
}

function* ospfInterfaces(state: ConfigTree, ifaceFilter?: string): Generator<InterfaceVisit> {
  const xpathIface = ifaceFilter === undefined ? XPATH_IFACE : `${XPATH_IFACE}[name='${ifaceFilter}']`;
  for (const inst of findNodes(state, state.root, XPATH_INSTANCE)) {
    const instance = childValue(state, inst, 'name');
    for (const areaNode of findNodes(state, inst, XPATH_AREA)) {
      const area = childValue(state, areaNode, 'area-id');
      for (const iface of findNodes(state, areaNode, xpathIface)) {
        yield { instance, area, iface };
      }
    }
  }
}

function neighborPath(routerId?: string): string {
  return routerId === undefined ? XPATH_NBR : `${XPATH_NBR}[neighbor-router-id='${routerId}']`;
}

/** " name: value" lines for the non-key leaves of a node, plus its detail groups. */
function detailLines(state: ConfigTree, id: NodeId): string[] {
  const lines: string[] = [];
  for (const child of state.children(id)) {
    const node = state.node(child);
    if (node.kind === 'list-key') continue;
    if (node.value !== undefined) {
      lines.push(` ${node.name}: ${node.value}`);
    } else if (DETAIL_GROUPS.has(node.name)) {
      lines.push(` ${node.name}`);
      for (const sub of state.children(child)) {
        const subNode = state.node(sub);
        if (subNode.value !== undefined) lines.push(`  ${subNode.name}: ${subNode.value}`);
      }
    }
  }
  return lines;
}

function fetchOspfState(session: Session): ConfigTree {
  return session.fetchState(XPATH_REQ);
}

// ─── show ospf interface ─────────────────────────────────────────────

export const cmdShowOspfInterface: CommandAction = ({ session }, args) => {
  const name = getOptArg(args, 'name');
  const state = fetchOspfState(session);

  const table = new Table([
    'Instance', 'Area', 'Name', 'Type', 'State', 'Priority', 'Cost', 'Hello Interval (s)',
  ]);
  for (const { instance, area, iface } of ospfInterfaces(state, name)) {
    const timer = childOptValue(state, iface, 'hello-timer');
    table.addRow([
      instance,
      area,
      childValue(state, iface, 'name'),
      childValue(state, iface, 'interface-type'),
      childValue(state, iface, 'state'),
      childValue(state, iface, 'priority'),
      childValue(state, iface, 'cost'),
      `${childValue(state, iface, 'hello-interval')} (${timer === undefined ? 'inactive' : `due in ${timer}`})`,
    ]);
  }

  pageTableOrFail(session, table);
  return false;
};

export const cmdShowOspfInterfaceDetail: CommandAction = ({ session }, args) => {
  const name = getOptArg(args, 'name');
  const state = fetchOspfState(session);

  let output = '';
  for (const { instance, area, iface } of ospfInterfaces(state, name)) {
    output += `${childValue(state, iface, 'name')}\n`;
    output += ` instance: ${instance}\n`;
    output += ` area: ${area}\n`;
    for (const line of detailLines(state, iface)) output += `${line}\n`;
    output += '\n';
  }

  pageOrFail(session, output, 'data');
  return false;
};

// ─── show ospf neighbor ──────────────────────────────────────────────

export const cmdShowOspfNeighbor: CommandAction = ({ session }, args) => {
  const routerId = getOptArg(args, 'router-id');
  const state = fetchOspfState(session);

  const table = new Table([
    'Instance', 'Area', 'Interface', 'Router ID', 'Address', 'State', 'Dead Interval (s)',
  ]);
  for (const { instance, area, iface } of ospfInterfaces(state)) {
    const ifname = childValue(state, iface, 'name');
    const deadInterval = childValue(state, iface, 'dead-interval');
    for (const nbr of findNodes(state, iface, neighborPath(routerId))) {
      table.addRow([
        instance,
        area,
        ifname,
        childValue(state, nbr, 'neighbor-router-id'),
        childValue(state, nbr, 'address'),
        childValue(state, nbr, 'state'),
        `${deadInterval} (due in ${childValue(state, nbr, 'dead-timer')})`,
      ]);
    }
  }

  pageTableOrFail(session, table);
  return false;
};

export const cmdShowOspfNeighborDetail: CommandAction = ({ session }, args) => {
  const routerId = getOptArg(args, 'router-id');
  const state = fetchOspfState(session);

  let output = '';
  for (const { instance, area, iface } of ospfInterfaces(state)) {
    const ifname = childValue(state, iface, 'name');
    for (const nbr of findNodes(state, iface, neighborPath(routerId))) {
      output += `${childValue(state, nbr, 'neighbor-router-id')}\n`;
      output += ` instance: ${instance}\n`;
      output += ` area: ${area}\n`;
      output += ` interface: ${ifname}\n`;
      for (const line of detailLines(state, nbr)) output += `${line}\n`;
      output += '\n';
    }
  }

  pageOrFail(session, output, 'data');
  return false;
};

// ─── show ospf route ─────────────────────────────────────────────────

export const cmdShowOspfRoute: CommandAction = ({ session }, args) => {
  const prefixFilter = getOptArg(args, 'prefix');
  const state = fetchOspfState(session);
  const xpathRib = prefixFilter === undefined ? XPATH_RIB : `${XPATH_RIB}[prefix='${prefixFilter}']`;

  const table = new Table([
    'Instance', 'Prefix', 'Metric', 'Type', 'Tag', 'Nexthop Interface', 'Nexthop Address',
  ]);
  for (const inst of findNodes(state, state.root, XPATH_INSTANCE)) {
    const instance = childValue(state, inst, 'name');
    for (const route of findNodes(state, inst, xpathRib)) {
      const routeCells = [
        childValue(state, route, 'prefix'),
        childValue(state, route, 'metric'),
        childValue(state, route, 'route-type'),
        childValue(state, route, 'route-tag'),
      ];
      // route columns are only filled on the first next-hop row
      findNodes(state, route, XPATH_NEXTHOP).forEach((nh, i) => {
        table.addRow([
          instance,
          ...(i === 0 ? routeCells : routeCells.map(() => '')),
          childValue(state, nh, 'outgoing-interface'),
          childValue(state, nh, 'next-hop'),
        ]);
      });
    }
  }

  pageTableOrFail(session, table);
  return false;
};

// ─── Registration ────────────────────────────────────────────────────

export function registerOspfShowCommands(commands: Commands): void {
  const { trie } = commands;
  const exec = commands.execRoot;
  trie.register(exec, 'show ospf interface', cmdShowOspfInterface);
  trie.register(exec, 'show ospf interface <name>', cmdShowOspfInterface);
  trie.register(exec, 'show ospf interface detail', cmdShowOspfInterfaceDetail);
  trie.register(exec, 'show ospf interface detail <name>', cmdShowOspfInterfaceDetail);
  trie.register(exec, 'show ospf neighbor', cmdShowOspfNeighbor);
  trie.register(exec, 'show ospf neighbor <router-id>', cmdShowOspfNeighbor);
  trie.register(exec, 'show ospf neighbor detail', cmdShowOspfNeighborDetail);
  trie.register(exec, 'show ospf neighbor detail <router-id>', cmdShowOspfNeighborDetail);
  trie.register(exec, 'show ospf route', cmdShowOspfRoute);
  trie.register(exec, 'show ospf route <prefix>', cmdShowOspfRoute);
}
