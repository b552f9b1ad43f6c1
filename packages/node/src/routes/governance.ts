/**
 * Governance routes.
 *
 * POST /api/v1/governance/proposals           - Create a proposal
 * GET  /api/v1/governance/proposals           - List proposals (cursor pagination)
 * GET  /api/v1/governance/proposals/:id       - Get a proposal with its status
 * POST /api/v1/governance/proposals/:id/votes - Cast a weighted vote
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateProposalSchema, PaginationQuerySchema, VoteSchema } from "../types/dto.js";
import type { CreateProposalDto, VoteDto } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate, sequenceOf } from "../types/pagination.js";
import { proposalView } from "../types/views.js";
import { validateBody } from "../middleware/validate.js";
import { requireCaller } from "../middleware/auth.js";

export function createGovernanceRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/governance/proposals
  routes.post("/proposals", validateBody(CreateProposalSchema), (c) => {
    const protocol = c.get("protocol");
    const sender = requireCaller(c.get("auth"));
    const body: CreateProposalDto = c.get("validatedBody");

    const proposal = protocol.createProposal(sender, body.title, body.description, body.duration);
    return c.json({ data: proposalView(proposal, protocol.proposalStatus(proposal.id)) }, 201);
  });

  // GET /api/v1/governance/proposals
  routes.get("/proposals", (c) => {
    const protocol = c.get("protocol");

    const queryResult = PaginationQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const page = paginate(
      protocol.governance.listProposals(),
      queryResult.data,
      (p) => sequenceOf(p.id),
      "proposal",
    );

    return c.json({
      data: page.data.map((p) => proposalView(p, protocol.proposalStatus(p.id))),
      pagination: page.pagination,
    });
  });

  // GET /api/v1/governance/proposals/:id
  routes.get("/proposals/:id", (c) => {
    const protocol = c.get("protocol");
    const proposal = protocol.governance.requireProposal(c.req.param("id"));

    return c.json({ data: proposalView(proposal, protocol.proposalStatus(proposal.id)) });
  });

  // POST /api/v1/governance/proposals/:id/votes
  routes.post("/proposals/:id/votes", validateBody(VoteSchema), (c) => {
    const protocol = c.get("protocol");
    const sender = requireCaller(c.get("auth"));
    const body: VoteDto = c.get("validatedBody");

    const proposal = protocol.voteOnProposal(sender, c.req.param("id"), body.choice, body.weight);
    return c.json({ data: proposalView(proposal, protocol.proposalStatus(proposal.id)) });
  });

  return routes;
}
