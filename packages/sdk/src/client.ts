/**
 * @collegium/sdk - Collegium Client.
 *
 * Main entry point for the Collegium SDK. Methods are grouped by
 * resource (client.proposals, client.courses, ...) and delegate to
 * HttpClient for transport. Amounts are passed and returned as bigint.
 */

import { z } from "zod";
import type { CollegiumClientConfig, CollegiumResponse, RequestOptions } from "./types.js";
import { HttpClient } from "./http-client.js";
import {
  AccountRoleSchema,
  CourseSchema,
  EnrollmentSchema,
  ExecutionResultSchema,
  HealthSchema,
  LedgerAccountSchema,
  ProposalDurationSchema,
  ProposalSchema,
  ProposalWithStatusSchema,
  RatingResultSchema,
  RescueSchema,
  RoleMembersSchema,
  SplitSchema,
  StoredEventSchema,
  TeacherRatingSchema,
  TransferSchema,
  TreasurySchema,
  pageOf,
} from "./schemas.js";
import type {
  AccountRole,
  Course,
  Enrollment,
  ExecutionResult,
  Health,
  LedgerAccount,
  MemberRole,
  Page,
  Proposal,
  ProposalWithStatus,
  RatingResult,
  Rescue,
  RoleMembers,
  Split,
  StoredEvent,
  TeacherRating,
  Transfer,
  Treasury,
} from "./schemas.js";

const API = "/api/v1";

function seg(value: string | number): string {
  return encodeURIComponent(String(value));
}

function withQuery(path: string, params: Record<string, string | number | boolean | undefined>): string {
  const query = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) query.set(key, String(value));
  }
  const qs = query.toString();
  return qs.length > 0 ? `${path}?${qs}` : path;
}

// =============================================================================
// Parameter Types
// =============================================================================

export interface PageParams {
  readonly cursor?: string | undefined;
  readonly limit?: number | undefined;
}

export interface ListCoursesParams extends PageParams {
  readonly includeRemoved?: boolean | undefined;
}

export interface CreateCourseParams {
  readonly title: string;
  readonly price: bigint;
  readonly teachers: readonly string[];
  /** Basis points aligned with `teachers`; must sum to 10000 */
  readonly shares: readonly number[];
}

export interface ListEventsParams extends PageParams {
  readonly afterPosition?: number | undefined;
  readonly types?: readonly string[] | undefined;
}

export interface ListStreamEventsParams extends PageParams {
  readonly afterVersion?: number | undefined;
}

// =============================================================================
// Namespace Classes
// =============================================================================

export class MembersNamespace {
  constructor(private readonly http: HttpClient) {}

  async roleOf(account: string): Promise<CollegiumResponse<AccountRole>> {
    return this.http.get(`${API}/members/account/${seg(account)}`, AccountRoleSchema);
  }

  async list(role: MemberRole): Promise<CollegiumResponse<RoleMembers>> {
    return this.http.get(`${API}/members/${seg(role)}`, RoleMembersSchema);
  }
}

/**
 * Admission proposals.
 */
export class ProposalsNamespace {
  constructor(private readonly http: HttpClient) {}

  async create(
    candidate: string,
    role: MemberRole,
    options?: RequestOptions,
  ): Promise<CollegiumResponse<Proposal>> {
    return this.http.post(`${API}/proposals`, { candidate, role }, ProposalSchema, options);
  }

  async get(id: number): Promise<CollegiumResponse<ProposalWithStatus>> {
    return this.http.get(`${API}/proposals/${seg(id)}`, ProposalWithStatusSchema);
  }

  async list(params?: PageParams): Promise<CollegiumResponse<Page<ProposalWithStatus>>> {
    return this.http.getBare(
      withQuery(`${API}/proposals`, { cursor: params?.cursor, limit: params?.limit }),
      pageOf(ProposalWithStatusSchema),
    );
  }

  async vote(
    id: number,
    support: boolean,
    options?: RequestOptions,
  ): Promise<CollegiumResponse<Proposal>> {
    return this.http.post(`${API}/proposals/${seg(id)}/votes`, { support }, ProposalSchema, options);
  }

  /**
   * Resolve a proposal whose voting window has closed.
   */
  async execute(id: number, options?: RequestOptions): Promise<CollegiumResponse<ExecutionResult>> {
    return this.http.post(`${API}/proposals/${seg(id)}/execute`, {}, ExecutionResultSchema, options);
  }
}

export class CoursesNamespace {
  constructor(private readonly http: HttpClient) {}

  async create(
    params: CreateCourseParams,
    options?: RequestOptions,
  ): Promise<CollegiumResponse<Course>> {
    return this.http.post(
      `${API}/courses`,
      { ...params, price: params.price.toString() },
      CourseSchema,
      options,
    );
  }

  async get(id: number): Promise<CollegiumResponse<Course>> {
    return this.http.get(`${API}/courses/${seg(id)}`, CourseSchema);
  }

  async list(params?: ListCoursesParams): Promise<CollegiumResponse<Page<Course>>> {
    return this.http.getBare(
      withQuery(`${API}/courses`, {
        cursor: params?.cursor,
        limit: params?.limit,
        includeRemoved: params?.includeRemoved,
      }),
      pageOf(CourseSchema),
    );
  }

  /** Soft delete; the record stays readable with `exists: false`. */
  async remove(id: number): Promise<CollegiumResponse<Course>> {
    return this.http.delete(`${API}/courses/${seg(id)}`, CourseSchema);
  }
}

/**
 * Application, committee vote, paid confirmation and completion.
 */
export class EnrollmentsNamespace {
  constructor(private readonly http: HttpClient) {}

  async apply(courseId: number, options?: RequestOptions): Promise<CollegiumResponse<Enrollment>> {
    return this.http.post(
      `${API}/courses/${seg(courseId)}/applications`,
      {},
      EnrollmentSchema,
      options,
    );
  }

  async list(courseId: number): Promise<CollegiumResponse<readonly Enrollment[]>> {
    return this.http.get(`${API}/courses/${seg(courseId)}/applications`, z.array(EnrollmentSchema));
  }

  async get(courseId: number, student: string): Promise<CollegiumResponse<Enrollment>> {
    return this.http.get(
      `${API}/courses/${seg(courseId)}/applications/${seg(student)}`,
      EnrollmentSchema,
    );
  }

  async vote(
    courseId: number,
    student: string,
    accept: boolean,
    options?: RequestOptions,
  ): Promise<CollegiumResponse<Enrollment>> {
    return this.http.post(
      `${API}/courses/${seg(courseId)}/applications/${seg(student)}/votes`,
      { accept },
      EnrollmentSchema,
      options,
    );
  }

  /**
   * Pay the course price into the treasury. The caller must have
   * approved the treasury for at least the price first.
   */
  async confirm(courseId: number, options?: RequestOptions): Promise<CollegiumResponse<Enrollment>> {
    return this.http.post(
      `${API}/courses/${seg(courseId)}/enrollment/confirm`,
      {},
      EnrollmentSchema,
      options,
    );
  }

  async complete(
    courseId: number,
    student: string,
    options?: RequestOptions,
  ): Promise<CollegiumResponse<Split>> {
    return this.http.post(
      `${API}/courses/${seg(courseId)}/applications/${seg(student)}/complete`,
      {},
      SplitSchema,
      options,
    );
  }
}

export class RatingsNamespace {
  constructor(private readonly http: HttpClient) {}

  async rate(
    courseId: number,
    teacher: string,
    value: number,
    options?: RequestOptions,
  ): Promise<CollegiumResponse<RatingResult>> {
    return this.http.post(
      `${API}/courses/${seg(courseId)}/ratings`,
      { teacher, value },
      RatingResultSchema,
      options,
    );
  }

  /** Split `amount` from the treasury by rating weight. */
  async bonus(
    courseId: number,
    amount: bigint,
    options?: RequestOptions,
  ): Promise<CollegiumResponse<Split>> {
    return this.http.post(
      `${API}/courses/${seg(courseId)}/bonus`,
      { amount: amount.toString() },
      SplitSchema,
      options,
    );
  }

  async ofTeacher(account: string): Promise<CollegiumResponse<TeacherRating>> {
    return this.http.get(`${API}/teachers/${seg(account)}/rating`, TeacherRatingSchema);
  }
}

export class TreasuryNamespace {
  constructor(private readonly http: HttpClient) {}

  async get(): Promise<CollegiumResponse<Treasury>> {
    return this.http.get(`${API}/treasury`, TreasurySchema);
  }

  async payout(
    to: string,
    amount: bigint,
    options?: RequestOptions,
  ): Promise<CollegiumResponse<Transfer>> {
    return this.http.post(
      `${API}/treasury/payouts`,
      { to, amount: amount.toString() },
      TransferSchema,
      options,
    );
  }
}

/**
 * Owner-only operations.
 */
export class AdminNamespace {
  constructor(private readonly http: HttpClient) {}

  async setProposalDuration(seconds: number): Promise<CollegiumResponse<{ seconds: number }>> {
    return this.http.put(`${API}/admin/proposal-duration`, { seconds }, ProposalDurationSchema);
  }

  async rescue(
    asset: string,
    to: string,
    amount: bigint,
    options?: RequestOptions,
  ): Promise<CollegiumResponse<Rescue>> {
    return this.http.post(
      `${API}/admin/rescue`,
      { asset, to, amount: amount.toString() },
      RescueSchema,
      options,
    );
  }
}

export class LedgerNamespace {
  constructor(private readonly http: HttpClient) {}

  async account(account: string): Promise<CollegiumResponse<LedgerAccount>> {
    return this.http.get(`${API}/ledger/${seg(account)}`, LedgerAccountSchema);
  }

  /** Allow the treasury to collect up to `amount` from the caller. */
  async approve(amount: bigint, options?: RequestOptions): Promise<CollegiumResponse<LedgerAccount>> {
    return this.http.post(
      `${API}/ledger/approve`,
      { amount: amount.toString() },
      LedgerAccountSchema,
      options,
    );
  }

  /** Development faucet; 404 unless the server runs with DEV_FAUCET. */
  async mint(
    to: string,
    amount: bigint,
    options?: RequestOptions,
  ): Promise<CollegiumResponse<LedgerAccount>> {
    return this.http.post(
      `${API}/ledger/mint`,
      { to, amount: amount.toString() },
      LedgerAccountSchema,
      options,
    );
  }
}

export class EventsNamespace {
  constructor(private readonly http: HttpClient) {}

  async list(params?: ListEventsParams): Promise<CollegiumResponse<Page<StoredEvent>>> {
    return this.http.getBare(
      withQuery(`${API}/events`, {
        cursor: params?.cursor,
        limit: params?.limit,
        afterPosition: params?.afterPosition,
        type: params?.types !== undefined && params.types.length > 0
          ? params.types.join(",")
          : undefined,
      }),
      pageOf(StoredEventSchema),
    );
  }

  async stream(
    streamId: string,
    params?: ListStreamEventsParams,
  ): Promise<CollegiumResponse<Page<StoredEvent>>> {
    return this.http.getBare(
      withQuery(`${API}/events/${seg(streamId)}`, {
        cursor: params?.cursor,
        limit: params?.limit,
        afterVersion: params?.afterVersion,
      }),
      pageOf(StoredEventSchema),
    );
  }
}

// =============================================================================
// Main Client
// =============================================================================

/**
 * Collegium SDK client - main entry point.
 *
 * Usage:
 * ```typescript
 * const client = new CollegiumClient({
 *   baseUrl: "http://localhost:3000",
 *   apiKey: "your-api-key",
 * });
 *
 * const { data: course } = await client.courses.create({
 *   title: "Distributed Systems",
 *   price: 100n,
 *   teachers: ["tom", "tina"],
 *   shares: [6000, 4000],
 * });
 * ```
 */
export class CollegiumClient {
  readonly members: MembersNamespace;
  readonly proposals: ProposalsNamespace;
  readonly courses: CoursesNamespace;
  readonly enrollments: EnrollmentsNamespace;
  readonly ratings: RatingsNamespace;
  readonly treasury: TreasuryNamespace;
  readonly admin: AdminNamespace;
  readonly ledger: LedgerNamespace;
  readonly events: EventsNamespace;

  private readonly http: HttpClient;

  constructor(config: CollegiumClientConfig) {
    this.http = new HttpClient(config);
    this.members = new MembersNamespace(this.http);
    this.proposals = new ProposalsNamespace(this.http);
    this.courses = new CoursesNamespace(this.http);
    this.enrollments = new EnrollmentsNamespace(this.http);
    this.ratings = new RatingsNamespace(this.http);
    this.treasury = new TreasuryNamespace(this.http);
    this.admin = new AdminNamespace(this.http);
    this.ledger = new LedgerNamespace(this.http);
    this.events = new EventsNamespace(this.http);
  }

  /** Liveness probe. */
  async health(): Promise<CollegiumResponse<Health>> {
    return this.http.getBare("/health", HealthSchema);
  }
}
