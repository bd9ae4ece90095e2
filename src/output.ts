import { Plan, HelperPlan } from './types';

const formatRoute = (start: string, plan: Plan): string =>
  [start, ...plan.route].join(' -> ');

export const printPlanResult = (
  start: string,
  timeBudget: number,
  plan: Plan
): void => {
  console.log(`🚶 Alone for ${timeBudget} minutes:`);
  console.log(`     route => ${formatRoute(start, plan)}`);
  console.log(`     pressure => ${plan.pressure}`);
  console.log('');
};

export const printHelperResult = (
  start: string,
  timeBudget: number,
  plan: HelperPlan
): void => {
  console.log(`🐘 With a helper for ${timeBudget} minutes:`);
  console.log(`     you => ${formatRoute(start, plan.self)} (${plan.self.pressure})`);
  console.log(
    `     helper => ${formatRoute(start, plan.helper)} (${plan.helper.pressure})`
  );
  console.log(`     pressure => ${plan.pressure}`);
  console.log('');
};

/** Route log lines: `budget:agent:valve,valve,...` */
export const formatRouteLog = (
  timeBudget: number,
  plan: Plan,
  helperTimeBudget: number,
  helperPlan: HelperPlan
): string =>
  [
    `${timeBudget}:self:${plan.route.join(',')}`,
    `${helperTimeBudget}:you:${helperPlan.self.route.join(',')}`,
    `${helperTimeBudget}:helper:${helperPlan.helper.route.join(',')}`
  ].join('\n') + '\n';

export const ROUTE_AGENTS = ['self', 'you', 'helper'] as const;

export type RouteAgent = (typeof ROUTE_AGENTS)[number];

export interface RouteLine {
  budget: number;
  agent: RouteAgent;
  route: string[];
}

const isRouteAgent = (agent: string): agent is RouteAgent =>
  ROUTE_AGENTS.some((known) => known === agent);

/** Reads back one line written by formatRouteLog */
export const parseRouteLine = (line: string): RouteLine => {
  const matches = line.match(/^(\d+):(\w+):(.*)$/);
  if (!matches) {
    throw new Error('expected budget:agent:valves');
  }

  const [, budgetStr, agent, routeStr] = matches;
  if (!isRouteAgent(agent)) {
    throw new Error(
      `unknown agent ${agent}, expected one of ${ROUTE_AGENTS.join(', ')}`
    );
  }

  return {
    budget: parseInt(budgetStr, 10),
    agent,
    route: routeStr
      .split(',')
      .map((name) => name.trim())
      .filter((name) => name !== '')
  };
};
