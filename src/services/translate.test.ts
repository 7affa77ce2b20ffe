import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const { ctor, translateText, getSupportedLanguages } = vi.hoisted(() => ({
  ctor: vi.fn(),
  translateText: vi.fn(),
  getSupportedLanguages: vi.fn(),
}));

vi.mock("@google-cloud/translate", () => ({
  TranslationServiceClient: class {
    constructor(options: unknown) {
      ctor(options);
    }
    translateText = translateText;
    getSupportedLanguages = getSupportedLanguages;
  },
}));

import { CredentialError } from "./credentials.js";
import { Notices } from "./notices.js";
import {
  TranslateFacade,
  createGoogleTranslationClient,
  type ClientHandle,
  type TranslationClient,
} from "./translate.js";

const key = {
  type: "service_account",
  project_id: "demo-project",
  client_email: "translator@demo-project.iam.gserviceaccount.com",
  private_key: "test-private-key",
};

const phrases: Record<string, string> = {
  "Hello|es": "Hola",
  "Goodbye|fr": "Au revoir",
  "Hello|fr": "Bonjour",
};

function stubClient() {
  return {
    translate: vi.fn<TranslationClient["translate"]>(async (text, target) => {
      return phrases[`${text}|${target}`] ?? `[${target}] ${text}`;
    }),
    listLanguages: vi.fn<TranslationClient["listLanguages"]>(async () => [
      { code: "es", name: "Spanish" },
    ]),
  };
}

const ready =
  (client: TranslationClient) =>
  async (): Promise<ClientHandle> => ({ status: "ready", client });

describe("TranslateFacade", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("translates through the client", async () => {
    const client = stubClient();
    const facade = new TranslateFacade(ready(client));
    const notices = new Notices();

    expect(await facade.translate("Hello", "es", notices)).toBe("Hola");
    expect(client.translate).toHaveBeenCalledTimes(1);
    expect(client.translate).toHaveBeenCalledWith("Hello", "es");
    expect(notices.items).toEqual([]);
  });

  it("returns an empty result for empty text without calling the service", async () => {
    const client = stubClient();
    const facade = new TranslateFacade(ready(client));

    expect(await facade.translate("", "es", new Notices())).toBe("");
    expect(client.translate).not.toHaveBeenCalled();
  });

  it("calls the service once per text and target pair", async () => {
    const client = stubClient();
    const facade = new TranslateFacade(ready(client));

    expect(await facade.translate("Hello", "es", new Notices())).toBe("Hola");
    expect(await facade.translate("Hello", "es", new Notices())).toBe("Hola");
    expect(client.translate).toHaveBeenCalledTimes(1);

    expect(await facade.translate("Hello", "fr", new Notices())).toBe("Bonjour");
    expect(client.translate).toHaveBeenCalledTimes(2);
  });

  it("shares one call between concurrent identical requests", async () => {
    const client = stubClient();
    const facade = new TranslateFacade(ready(client));

    const results = await Promise.all([
      facade.translate("Hello", "es", new Notices()),
      facade.translate("Hello", "es", new Notices()),
    ]);

    expect(results).toEqual(["Hola", "Hola"]);
    expect(client.translate).toHaveBeenCalledTimes(1);
  });

  it("reports an unavailable client", async () => {
    const facade = new TranslateFacade(async () => ({ status: "unavailable" }));
    const notices = new Notices();

    expect(await facade.translate("Hello", "es", notices)).toBe("");
    expect(notices.items).toEqual([
      {
        level: "error",
        message: "Translation client could not be initialized. Please check your credentials.",
      },
    ]);
  });

  it("reports a failed call and keeps serving other requests", async () => {
    const client = stubClient();
    client.translate.mockRejectedValueOnce(new Error("quota exceeded"));
    const facade = new TranslateFacade(ready(client));

    const failed = new Notices();
    expect(await facade.translate("Hello", "es", failed)).toBe("");
    expect(failed.items).toEqual([
      { level: "error", message: "Translation failed. Error: quota exceeded" },
    ]);

    const next = new Notices();
    expect(await facade.translate("Goodbye", "fr", next)).toBe("Au revoir");
    expect(next.items).toEqual([]);
  });

  it("does not cache failures", async () => {
    const client = stubClient();
    client.translate.mockRejectedValueOnce(new Error("timeout"));
    const facade = new TranslateFacade(ready(client));

    expect(await facade.translate("Hello", "es", new Notices())).toBe("");
    expect(await facade.translate("Hello", "es", new Notices())).toBe("Hola");
    expect(client.translate).toHaveBeenCalledTimes(2);
  });

  it("propagates credential failures from the client factory", async () => {
    const failure = new CredentialError("source-missing", "No Google credentials found.");
    const facade = new TranslateFacade(async () => {
      throw failure;
    });

    await expect(facade.translate("Hello", "es", new Notices())).rejects.toBe(failure);
  });

  it("lists supported languages", async () => {
    const client = stubClient();
    const facade = new TranslateFacade(ready(client));

    expect(await facade.listLanguages("en", new Notices())).toEqual([
      { code: "es", name: "Spanish" },
    ]);
    expect(client.listLanguages).toHaveBeenCalledWith("en");
  });

  it("reports a failed language listing", async () => {
    const client = stubClient();
    client.listLanguages.mockRejectedValueOnce(new Error("forbidden"));
    const facade = new TranslateFacade(ready(client));
    const notices = new Notices();

    expect(await facade.listLanguages("en", notices)).toEqual([]);
    expect(notices.items).toEqual([
      { level: "error", message: "Could not list supported languages. Error: forbidden" },
    ]);
  });
});

describe("createGoogleTranslationClient", () => {
  beforeEach(() => {
    ctor.mockReset();
    translateText.mockReset();
    getSupportedLanguages.mockReset();
  });

  it("authenticates with the service account key", () => {
    createGoogleTranslationClient(key, { location: "global" });

    expect(ctor).toHaveBeenCalledTimes(1);
    expect(ctor).toHaveBeenCalledWith({
      credentials: {
        client_email: "translator@demo-project.iam.gserviceaccount.com",
        private_key: "test-private-key",
      },
      projectId: "demo-project",
    });
  });

  it("sends plain text translation requests to the project parent", async () => {
    translateText.mockResolvedValue([{ translations: [{ translatedText: "Hola" }] }]);
    const client = createGoogleTranslationClient(key, { location: "us-central1" });

    expect(await client.translate("Hello", "es")).toBe("Hola");
    expect(translateText).toHaveBeenCalledWith({
      parent: "projects/demo-project/locations/us-central1",
      contents: ["Hello"],
      mimeType: "text/plain",
      targetLanguageCode: "es",
    });
  });

  it("returns an empty string when the response has no translations", async () => {
    translateText.mockResolvedValue([{ translations: [] }]);
    const client = createGoogleTranslationClient(key, { location: "global" });

    expect(await client.translate("Hello", "es")).toBe("");
  });

  it("uses the fallback project when the key has none", () => {
    const { project_id: _omit, ...withoutProject } = key;
    createGoogleTranslationClient(withoutProject, { location: "global", projectId: "fallback" });

    expect(ctor).toHaveBeenCalledWith(expect.objectContaining({ projectId: "fallback" }));
  });

  it("rejects a key without any project id", () => {
    const { project_id: _omit, ...withoutProject } = key;

    expect(() => createGoogleTranslationClient(withoutProject, { location: "global" })).toThrow(
      CredentialError
    );
    expect(ctor).not.toHaveBeenCalled();
  });

  it("maps supported languages and drops entries without a code", async () => {
    getSupportedLanguages.mockResolvedValue([
      {
        languages: [
          { languageCode: "es", displayName: "Spanish" },
          { languageCode: "tl", displayName: "" },
          { displayName: "Unknown" },
        ],
      },
    ]);
    const client = createGoogleTranslationClient(key, { location: "global" });

    expect(await client.listLanguages("en")).toEqual([
      { code: "es", name: "Spanish" },
      { code: "tl", name: "tl" },
    ]);
    expect(getSupportedLanguages).toHaveBeenCalledWith({
      parent: "projects/demo-project/locations/global",
      displayLanguageCode: "en",
    });
  });
});
