/**
 * Battery Planner API Types
 * TypeScript interfaces for the remote battery planning service
 */

/**
 * Credentials of one configured system (one Homey device)
 */
export interface Credentials {
  systemId: string;
  apiToken: string;
  baseUrl: string;
}

/**
 * Validated input of a single plan request
 */
export interface PlanRequest {
  powerKw: number[];        // Expected power demand per slot (kW)
  batteryCurrentSoc: number; // Current state of charge (%)
  allowExport: boolean;
  updateSensors: boolean;
}

/**
 * Body sent to POST /api/battery_planner/{system_id}/plan
 */
export interface PlanRequestBody {
  power_kw: number[];
  battery_current_soc: number;
  allow_export: boolean;
}

/**
 * Action names returned by the planner. The service may add new ones.
 */
export type PlanActionName = 'charge' | 'discharge' | 'idle' | (string & {});

export interface PlanScheduleEntry {
  time: string;
  action: {
    name: PlanActionName;
    power: number;
  };
  cost: {
    baseline: number;
    optimized: number;
  };
  price: {
    import: number;
    export: number;
  };
  soc: {
    start: number;
    end: number;
    delta: number;
  };
}

export type PlanSchedule = ReadonlyArray<Readonly<PlanScheduleEntry>>;

/**
 * Parsed planner response
 */
export interface PlanResponse {
  baselineCost: number;
  optimizedCost: number;
  schedule: PlanSchedule;
}

export type PlannerErrorKind = 'configuration' | 'connectivity' | 'auth' | 'upstream' | 'publish';

export interface PlanSuccess extends PlanResponse {
  success: true;
}

export interface PlanFailure {
  success: false;
  error: string;
  errorKind: PlannerErrorKind;
}

export type PlanResult = PlanSuccess | PlanFailure;

/**
 * Response fields of the create_plan service call
 */
export interface CreatePlanServiceResponse {
  success: boolean;
  baseline_cost?: number;
  optimized_cost?: number;
  schedule?: PlanScheduleEntry[];
  error?: string;
}

/**
 * Logger implemented by the Homey app, driver or device owning a logic module
 */
export interface PlannerLogger {
  log(...args: unknown[]): void;
  error(...args: unknown[]): void;
}
