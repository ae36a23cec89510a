import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { RetrievalService } from "../rag/services/RetrievalService";
import { handleSearchFaq, SEARCH_FAQ_DESCRIPTION, SEARCH_FAQ_TOOL, searchFaqInput } from "./faqTool";

export const MCP_SERVER_NAME = "faq-search-server";

export const createFaqMcpServer = (retrieval: RetrievalService, version = "1.0.0"): McpServer => {
  const server = new McpServer({ name: MCP_SERVER_NAME, version });

  server.registerTool(
    SEARCH_FAQ_TOOL,
    { description: SEARCH_FAQ_DESCRIPTION, inputSchema: searchFaqInput },
    ({ query }) => handleSearchFaq(retrieval, query, retrieval.defaultTopK)
  );

  return server;
};
