/**
 * Wire method model.
 *
 * A closed description of one HTTP call: the verb is carried by the tag, so a
 * caller cannot send a body with GET or forget it on POST.
 */

export type HttpVerb = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type Method<Q, B = never> =
  | { readonly _tag: "Get"; readonly query: Q }
  | { readonly _tag: "Post"; readonly query: Q; readonly body: B }
  | { readonly _tag: "Put"; readonly query: Q; readonly body: B }
  | { readonly _tag: "Patch"; readonly query: Q; readonly body: B }
  | { readonly _tag: "Delete"; readonly query: Q };

/**
 * Constructors for {@link Method}.
 *
 * @example
 * ```typescript
 * Method.get({ limit: 20 });
 * Method.post({ primaryKey: "id" }, documents);
 * ```
 */
export const Method = {
  get: <Q>(query: Q): Method<Q> => ({ _tag: "Get", query }),
  post: <Q, B>(query: Q, body: B): Method<Q, B> => ({ _tag: "Post", query, body }),
  put: <Q, B>(query: Q, body: B): Method<Q, B> => ({ _tag: "Put", query, body }),
  patch: <Q, B>(query: Q, body: B): Method<Q, B> => ({ _tag: "Patch", query, body }),
  delete: <Q>(query: Q): Method<Q> => ({ _tag: "Delete", query }),
} as const;

export function httpVerb<Q, B>(method: Method<Q, B>): HttpVerb {
  switch (method._tag) {
    case "Get":
      return "GET";
    case "Post":
      return "POST";
    case "Put":
      return "PUT";
    case "Patch":
      return "PATCH";
    case "Delete":
      return "DELETE";
  }
}

/**
 * The request payload, present only for POST, PUT and PATCH.
 */
export function bodyOf<Q, B>(
  method: Method<Q, B>
): { readonly value: B } | undefined {
  switch (method._tag) {
    case "Post":
    case "Put":
    case "Patch":
      return { value: method.body };
    case "Get":
    case "Delete":
      return undefined;
  }
}
