import { describe, expect, it } from "vitest";

import { RequestError } from "../src/errors";
import { documentToRequest } from "../src/service/graphql";
import { thrownBy } from "./test-utils";

describe("documentToRequest", () => {
  it("resolves arguments against variables", () => {
    const result = documentToRequest({
      query: `query FindUser($email: String) {
        user(where: { email: $email }) { id name }
      }`,
      variables: { email: "sarah@example.com" },
    });

    expect(result).toEqual({
      kind: "query",
      responseKey: "user",
      request: {
        operation: "user",
        args: { where: { email: "sarah@example.com" } },
        select: { id: true, name: true },
      },
    });
  });

  it("reads enum literals as strings and keeps nested arguments", () => {
    const result = documentToRequest({
      query: `{
        usersConnection(first: 2, orderBy: name_DESC) {
          edges { node { posts(where: { published: true }) { title } } }
        }
      }`,
    });

    expect(result.request).toEqual({
      operation: "usersConnection",
      args: { first: 2, orderBy: "name_DESC" },
      select: {
        edges: {
          select: {
            node: {
              select: {
                posts: {
                  args: { where: { published: true } },
                  select: { title: true },
                },
              },
            },
          },
        },
      },
    });
  });

  it("reports the alias of the root field as the response key", () => {
    const result = documentToRequest({
      query: `mutation { removed: deleteManyUsers { count } }`,
    });

    expect(result.kind).toBe("mutation");
    expect(result.responseKey).toBe("removed");
    expect(result.request).toEqual({
      operation: "deleteManyUsers",
      select: { count: true },
    });
  });

  it("flattens fragments and merges repeated fields", () => {
    const result = documentToRequest({
      query: `
        query {
          users {
            ...UserFields
            posts { title }
            ... on User { posts { published } }
          }
        }
        fragment UserFields on User { name email }
      `,
    });

    expect(result.request.select).toEqual({
      name: true,
      email: true,
      posts: { select: { title: true, published: true } },
    });
  });

  it("picks the named operation", () => {
    const result = documentToRequest({
      query: `
        query First { users { id } }
        query Second { posts { id } }
      `,
      operationName: "Second",
    });

    expect(result.request.operation).toBe("posts");
  });

  it("leaves unset variables out of the arguments", () => {
    const result = documentToRequest({
      query: `query ($first: Int) { users(first: $first) { id } }`,
      variables: null,
    });

    expect(result.request.args).toEqual({ first: undefined });
  });

  it.each([
    ["{ users { id ", /Invalid GraphQL document/],
    ["subscription { user { id } }", /Subscriptions are served by the change feed/],
    ["{ users { id } posts { id } }", /Expected exactly one root field, found 2/],
    ["query A { users { id } } query B { posts { id } }", /Expected exactly one operation, found 2/],
    ["{ users { ...Missing } }", /Unknown fragment "Missing"/],
    [
      "{ users { ...Loop } } fragment Loop on User { posts { ...Loop } }",
      /Fragment "Loop" spreads itself/,
    ],
  ])("rejects %s", (query, message) => {
    const error = thrownBy(() => documentToRequest({ query }));

    expect(error).toBeInstanceOf(RequestError);
    expect(error).toMatchObject({ code: "INVALID_DOCUMENT" });
    expect(String(error)).toMatch(message);
  });

  it("rejects an operation name that matches nothing", () => {
    expect(() =>
      documentToRequest({ query: "query A { users { id } }", operationName: "B" }),
    ).toThrow('Expected one operation named "B", found 0');
  });
});
