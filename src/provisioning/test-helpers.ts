/**
 * In-memory stand-ins for the provisioning ports: a fake tenant holding the
 * directory and authorization state, a prompter that replays scripted
 * answers, and a logger that captures what it would print and persist.
 */

import type { AzureSession } from "../credentials/index.js";
import type {
  AppRoleAssignment,
  GraphApplication,
  GraphServicePrincipal,
  PasswordCredential,
  PasswordCredentialSecret,
} from "../graph/index.js";
import { roleDefinitionGuid, roleDefinitionIdForScope } from "../iam/index.js";
import type { CustomRoleInput, RoleAssignment, RoleDefinition } from "../iam/index.js";
import { OnboardingLoggerImpl, REDACTED, type LogEntry, type LogTransport, type OnboardingLogger } from "../logging/index.js";
import type { AnswerValidator, Prompter } from "../prompts/index.js";
import type { AzureSubscription, TenantInfo } from "../subscriptions/index.js";
import {
  GRAPH_APPLICATION_READ_ROLE,
  MICROSOFT_GRAPH_APP_ID,
  READER_ROLE_NAME,
  RESERVATIONS_READER_ROLE_NAME,
  SAVINGS_PLAN_READER_ROLE_NAME,
} from "../constants.js";
import type {
  ApplicationDirectory,
  ProvisioningSettings,
  RoleAuthority,
  SessionProvider,
  TenantDirectory,
} from "./types.js";

// =============================================================================
// Fake tenant
// =============================================================================

export const GRAPH_SERVICE_PRINCIPAL_ID = "graph-sp";
export const GRAPH_APP_READ_ROLE_ID = "app-read-all-role";

type FailureRule = (firstArg: string) => boolean;

export type FakeTenantOptions = {
  tenants?: TenantInfo[];
  subscriptions?: AzureSubscription[];
  /** Lookups that miss a freshly created service principal before it shows up. */
  servicePrincipalLag?: number;
};

export function tenant(tenantId: string, displayName = "Contoso"): TenantInfo {
  return { tenantId, displayName, defaultDomain: `${tenantId}.contoso.test`, domains: [`${tenantId}.contoso.test`] };
}

export function subscription(subscriptionId: string, tenantId = "tenant-1"): AzureSubscription {
  return { subscriptionId, displayName: `Subscription ${subscriptionId}`, state: "Enabled", tenantId };
}

function builtInRole(name: string, roleName: string): RoleDefinition {
  return {
    id: roleDefinitionIdForScope("/", name),
    name,
    roleName,
    roleType: "BuiltInRole",
    permissions: [],
    assignableScopes: ["/"],
  };
}

function sameScope(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export class FakeAzureTenant implements SessionProvider, TenantDirectory, RoleAuthority, ApplicationDirectory {
  account = "ops@contoso.test";
  homeTenantId: string;
  tenants: TenantInfo[];
  subscriptions: AzureSubscription[];

  applications: GraphApplication[] = [];
  servicePrincipals: GraphServicePrincipal[] = [];
  passwords = new Map<string, PasswordCredential[]>();
  roleDefinitions: RoleDefinition[] = [
    builtInRole("reader-guid", READER_ROLE_NAME),
    builtInRole("reservations-reader-guid", RESERVATIONS_READER_ROLE_NAME),
    builtInRole("savings-plan-reader-guid", SAVINGS_PLAN_READER_ROLE_NAME),
  ];
  roleAssignments: RoleAssignment[] = [];
  appRoleAssignments: AppRoleAssignment[] = [];

  /** Names of mutating calls, in order. */
  readonly mutations: string[] = [];
  signIns = 0;
  closed = 0;
  selectedTenant?: string;
  boundSubscription?: string;

  private failures = new Map<string, FailureRule>();
  private servicePrincipalLag: number;
  private pendingVisibility = new Map<string, number>();
  private counter = 0;

  constructor(options: FakeTenantOptions = {}) {
    this.tenants = options.tenants ?? [tenant("tenant-1")];
    this.homeTenantId = this.tenants[0]?.tenantId ?? "tenant-home";
    this.subscriptions = options.subscriptions ?? [subscription("sub-1")];
    this.servicePrincipalLag = options.servicePrincipalLag ?? 0;
    this.servicePrincipals.push({
      id: GRAPH_SERVICE_PRINCIPAL_ID,
      appId: MICROSOFT_GRAPH_APP_ID,
      displayName: "Microsoft Graph",
      appRoles: [
        { id: "user-read-all-role", value: "User.Read.All", isEnabled: true, allowedMemberTypes: ["Application"] },
        { id: GRAPH_APP_READ_ROLE_ID, value: GRAPH_APPLICATION_READ_ROLE, isEnabled: true, allowedMemberTypes: ["Application"] },
      ],
    });
  }

  /** Make `method` throw a 403 whenever `rule` matches its first argument. */
  failWhen(method: string, rule: FailureRule = () => true): void {
    this.failures.set(method, rule);
  }

  /** Seed an existing application, its service principal and its secrets. */
  seedApplication(displayName: string, passwordExpiries: string[] = []): GraphApplication {
    const app = { id: "seeded-app-obj", appId: "seeded-app", displayName };
    this.applications.push(app);
    this.servicePrincipals.push({ id: "seeded-sp", appId: app.appId, displayName });
    this.passwords.set(
      app.id,
      passwordExpiries.map((endDateTime, i) => ({ keyId: `seeded-key-${i + 1}`, displayName: null, hint: "abc", endDateTime })),
    );
    return app;
  }

  seedCustomRole(roleName: string, assignableScopes: string[]): void {
    this.roleDefinitions.push({
      id: roleDefinitionIdForScope(assignableScopes[0] ?? "/", "seeded-custom-role"),
      name: "seeded-custom-role",
      roleName,
      roleType: "CustomRole",
      permissions: [],
      assignableScopes: [...assignableScopes],
    });
  }

  customRole(roleName: string): RoleDefinition | undefined {
    return this.roleDefinitions.find((r) => r.roleName === roleName && r.roleType === "CustomRole");
  }

  assignmentsAt(scope: string): RoleAssignment[] {
    return this.roleAssignments.filter((a) => sameScope(a.scope, scope));
  }

  // ---------------------------------------------------------------------------
  // SessionProvider
  // ---------------------------------------------------------------------------

  async signIn(): Promise<AzureSession> {
    this.maybeFail("signIn", "");
    this.signIns++;
    return { account: this.account, tenantId: this.homeTenantId, method: "cli" };
  }

  async switchAccount(): Promise<AzureSession> {
    this.account = "other@contoso.test";
    return this.signIn();
  }

  useTenant(tenantId: string): void {
    this.selectedTenant = tenantId;
  }

  // ---------------------------------------------------------------------------
  // TenantDirectory
  // ---------------------------------------------------------------------------

  async listTenants(): Promise<TenantInfo[]> {
    this.maybeFail("listTenants", "");
    return [...this.tenants];
  }

  async listSubscriptions(tenantId: string): Promise<AzureSubscription[]> {
    this.maybeFail("listSubscriptions", tenantId);
    return this.subscriptions.filter((s) => s.tenantId === tenantId);
  }

  // ---------------------------------------------------------------------------
  // RoleAuthority
  // ---------------------------------------------------------------------------

  useSubscription(subscriptionId: string): void {
    this.boundSubscription = subscriptionId;
  }

  async findRoleDefinition(scope: string, roleName: string): Promise<RoleDefinition | undefined> {
    this.maybeFail("findRoleDefinition", scope);
    const role = this.roleDefinitions.find(
      (r) => r.roleName === roleName && r.assignableScopes.some((s) => s === "/" || sameScope(s, scope)),
    );
    return role ? { ...role, id: roleDefinitionIdForScope(scope, role.name), assignableScopes: [...role.assignableScopes] } : undefined;
  }

  async findCustomRole(roleName: string, scopes: readonly string[]): Promise<RoleDefinition | undefined> {
    for (const scope of scopes) {
      const role = await this.findRoleDefinition(scope, roleName);
      if (role && role.roleType === "CustomRole") return role;
    }
    return undefined;
  }

  async findRoleAssignment(scope: string, principalId: string, roleDefinitionId: string): Promise<RoleAssignment | undefined> {
    this.maybeFail("findRoleAssignment", scope);
    const guid = roleDefinitionGuid(roleDefinitionId);
    return this.roleAssignments.find(
      (a) => a.principalId === principalId && roleDefinitionGuid(a.roleDefinitionId) === guid && sameScope(a.scope, scope),
    );
  }

  async createRoleAssignment(scope: string, principalId: string, roleDefinitionId: string): Promise<RoleAssignment> {
    this.maybeFail("createRoleAssignment", scope);
    if (await this.findRoleAssignment(scope, principalId, roleDefinitionId)) {
      throw Object.assign(new Error("The role assignment already exists."), { code: "RoleAssignmentExists", statusCode: 409 });
    }
    const assignment: RoleAssignment = {
      id: `${scope}/providers/Microsoft.Authorization/roleAssignments/ra-${++this.counter}`,
      name: `ra-${this.counter}`,
      principalId,
      principalType: "ServicePrincipal",
      roleDefinitionId: roleDefinitionIdForScope(scope, roleDefinitionGuid(roleDefinitionId)),
      scope,
    };
    this.roleAssignments.push(assignment);
    this.mutations.push("createRoleAssignment");
    return assignment;
  }

  async createCustomRole(input: CustomRoleInput, scope: string): Promise<RoleDefinition> {
    this.maybeFail("createCustomRole", scope);
    if (this.customRole(input.roleName)) {
      throw Object.assign(new Error(`A role definition named ${input.roleName} already exists.`), {
        code: "RoleDefinitionWithSameNameExists",
        statusCode: 409,
      });
    }
    const role: RoleDefinition = {
      id: roleDefinitionIdForScope(scope, `custom-role-${++this.counter}`),
      name: `custom-role-${this.counter}`,
      roleName: input.roleName,
      description: input.description,
      roleType: "CustomRole",
      permissions: [{ actions: [...input.actions], notActions: [], dataActions: [], notDataActions: [] }],
      assignableScopes: [scope],
    };
    this.roleDefinitions.push(role);
    this.mutations.push("createCustomRole");
    return { ...role, assignableScopes: [...role.assignableScopes] };
  }

  async addAssignableScope(role: RoleDefinition, scope: string): Promise<RoleDefinition> {
    this.maybeFail("addAssignableScope", scope);
    const stored = this.roleDefinitions.find((r) => r.name === role.name);
    if (!stored) throw new Error(`Role definition ${role.name} does not exist`);
    stored.assignableScopes.push(scope);
    this.mutations.push("addAssignableScope");
    return { ...stored, assignableScopes: [...stored.assignableScopes] };
  }

  // ---------------------------------------------------------------------------
  // ApplicationDirectory
  // ---------------------------------------------------------------------------

  async findApplication(displayName: string): Promise<GraphApplication | undefined> {
    this.maybeFail("findApplication", displayName);
    return this.applications.find((a) => a.displayName === displayName);
  }

  async createApplication(displayName: string): Promise<GraphApplication> {
    this.maybeFail("createApplication", displayName);
    const n = ++this.counter;
    const app = { id: `app-obj-${n}`, appId: `app-${n}`, displayName };
    this.applications.push(app);
    this.mutations.push("createApplication");
    return app;
  }

  async findServicePrincipal(appId: string): Promise<GraphServicePrincipal | undefined> {
    this.maybeFail("findServicePrincipal", appId);
    const pending = this.pendingVisibility.get(appId) ?? 0;
    if (pending > 0) {
      this.pendingVisibility.set(appId, pending - 1);
      return undefined;
    }
    return this.servicePrincipals.find((sp) => sp.appId === appId);
  }

  async createServicePrincipal(appId: string): Promise<GraphServicePrincipal> {
    this.maybeFail("createServicePrincipal", appId);
    const sp = { id: `sp-${++this.counter}`, appId, displayName: null };
    this.servicePrincipals.push(sp);
    this.pendingVisibility.set(appId, this.servicePrincipalLag);
    this.mutations.push("createServicePrincipal");
    return sp;
  }

  async listPasswordCredentials(applicationObjectId: string): Promise<PasswordCredential[]> {
    this.maybeFail("listPasswordCredentials", applicationObjectId);
    return [...(this.passwords.get(applicationObjectId) ?? [])];
  }

  async addPassword(applicationObjectId: string, displayName: string, endDateTime: Date): Promise<PasswordCredentialSecret> {
    this.maybeFail("addPassword", applicationObjectId);
    const n = ++this.counter;
    const credential = { keyId: `key-${n}`, displayName, hint: "tes", endDateTime: endDateTime.toISOString() };
    this.passwords.set(applicationObjectId, [...(this.passwords.get(applicationObjectId) ?? []), credential]);
    this.mutations.push("addPassword");
    return { ...credential, secretText: `test-secret-${n}` };
  }

  async findAppRoleAssignment(principalId: string, resourceId: string, appRoleId: string): Promise<AppRoleAssignment | undefined> {
    this.maybeFail("findAppRoleAssignment", principalId);
    return this.appRoleAssignments.find(
      (a) => a.principalId === principalId && a.resourceId === resourceId && a.appRoleId === appRoleId,
    );
  }

  async createAppRoleAssignment(principalId: string, resourceId: string, appRoleId: string): Promise<AppRoleAssignment> {
    this.maybeFail("createAppRoleAssignment", principalId);
    const assignment = { id: `ara-${++this.counter}`, principalId, resourceId, appRoleId };
    this.appRoleAssignments.push(assignment);
    this.mutations.push("createAppRoleAssignment");
    return assignment;
  }

  close(): void {
    this.closed++;
  }

  private maybeFail(method: string, firstArg: string): void {
    const rule = this.failures.get(method);
    if (rule && rule(firstArg)) {
      throw Object.assign(new Error(`${method} denied`), { code: "AuthorizationFailed", statusCode: 403 });
    }
  }
}

// =============================================================================
// Scripted prompter
// =============================================================================

export class ScriptedPrompter implements Prompter {
  readonly asked: string[] = [];
  readonly rejections: string[] = [];
  private answers: Array<string | boolean>;

  constructor(answers: Array<string | boolean>) {
    this.answers = [...answers];
  }

  get remaining(): number {
    return this.answers.length;
  }

  async confirm(message: string): Promise<boolean> {
    const answer = this.next(message);
    if (typeof answer !== "boolean") {
      throw new Error(`Expected a yes/no answer for "${message}", got "${answer}"`);
    }
    return answer;
  }

  async input(message: string, options?: { validate?: AnswerValidator }): Promise<string> {
    for (;;) {
      const answer = this.next(message);
      if (typeof answer !== "string") {
        throw new Error(`Expected a text answer for "${message}"`);
      }
      const verdict = options?.validate ? options.validate(answer) : true;
      if (verdict === true) return answer;
      this.rejections.push(verdict);
    }
  }

  async pause(message: string): Promise<void> {
    this.asked.push(message);
  }

  private next(message: string): string | boolean {
    this.asked.push(message);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`No scripted answer left for "${message}"`);
    }
    return answer;
  }
}

// =============================================================================
// Capturing logger
// =============================================================================

class MemoryTransport implements LogTransport {
  readonly name = "memory";
  readonly entries: LogEntry[] = [];
  transcript: string[] = [];
  private masks: string[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
    this.transcript.push(this.applyMasks(entry.message));
  }

  mask(literal: string): void {
    this.masks.push(literal);
    this.transcript = this.transcript.map((line) => this.applyMasks(line));
  }

  private applyMasks(line: string): string {
    return this.masks.reduce((result, literal) => result.split(literal).join(REDACTED), line);
  }
}

export type MemoryLogger = {
  logger: OnboardingLogger;
  entries: LogEntry[];
  /** Messages as a persisted transcript would hold them. */
  transcript: () => string[];
  messages: (level?: LogEntry["level"]) => string[];
};

export function createMemoryLogger(): MemoryLogger {
  const transport = new MemoryTransport();
  const logger = new OnboardingLoggerImpl({ subsystem: "test", transports: [transport] });
  return {
    logger,
    entries: transport.entries,
    transcript: () => transport.transcript,
    messages: (level) => transport.entries.filter((e) => !level || e.level === level).map((e) => e.message),
  };
}

// =============================================================================
// Settings
// =============================================================================

export const TEST_START = "2026-10-19T12:00:00.000Z";

/**
 * Settings on a virtual clock: `sleep` advances time instantly.
 */
export function testSettings(overrides: Partial<ProvisioningSettings> = {}): ProvisioningSettings {
  let clock = Date.parse(TEST_START);
  return {
    secretValidityMonths: 12,
    maskSecrets: true,
    propagation: {
      servicePrincipal: { initialDelayMs: 1_000, maxDelayMs: 4_000, maxWaitMs: 10_000 },
      roleDefinitionCreate: { initialDelayMs: 1_000, maxDelayMs: 4_000, maxWaitMs: 10_000 },
      roleDefinitionUpdate: { initialDelayMs: 500, maxDelayMs: 2_000, maxWaitMs: 5_000 },
    },
    now: () => new Date(clock),
    sleep: async (ms) => {
      clock += ms;
    },
    ...overrides,
  };
}
