import { jest } from "@jest/globals";
import {
  HttpClientDirectory,
  NullClientDirectory,
  mapDirectoryContact,
  normalizePhoneNumber,
} from "../core/services/client-directory.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

describe("client directory", () => {
  it("normalizes phone numbers to digits", () => {
    expect(normalizePhoneNumber("+57 300-123 4567")).toBe("573001234567");
    expect(normalizePhoneNumber("whatsapp:+33612345678")).toBe("33612345678");
  });

  it("maps Spanish directory columns onto client info", () => {
    expect(
      mapDirectoryContact({
        empresa: " Acme SAS ",
        nombre: "Ana",
        apellido: "Pérez",
        cargo: "Gerente",
        sector: "Agroindustria",
        descripcion: null,
      })
    ).toEqual({ company: "Acme SAS", contact_name: "Ana Pérez", role: "Gerente", sector: "Agroindustria" });
  });

  it("accepts English field names", () => {
    expect(mapDirectoryContact({ company: "Acme", contact_name: "Jean Martin", role: "CEO", description: "Export" })).toEqual({
      company: "Acme",
      contact_name: "Jean Martin",
      role: "CEO",
      description: "Export",
    });
  });

  it("never finds anyone without a configured directory", async () => {
    await expect(new NullClientDirectory().lookup("573001234567")).resolves.toBeNull();
  });

  describe("HttpClientDirectory", () => {
    it("looks contacts up by phone digits with the bearer token", async () => {
      const fetchImpl = jest.fn<typeof fetch>(async () => jsonResponse({ empresa: "Acme", nombre: "Ana" }));
      const directory = new HttpClientDirectory({ baseUrl: "http://directory.test/", token: "test-secret", fetchImpl });

      await expect(directory.lookup("+57 300 123 4567")).resolves.toEqual({ company: "Acme", contact_name: "Ana" });
      expect(fetchImpl).toHaveBeenCalledTimes(1);
      const call = fetchImpl.mock.calls[0];
      expect(call?.[0]).toBe("http://directory.test/contacts/573001234567");
      expect(call?.[1]?.headers).toEqual({ Accept: "application/json", Authorization: "Bearer test-secret" });
    });

    it("returns null for unknown contacts", async () => {
      const fetchImpl = jest.fn<typeof fetch>(async () => new Response("", { status: 404 }));
      const directory = new HttpClientDirectory({ baseUrl: "http://directory.test", fetchImpl });
      await expect(directory.lookup("573001234567")).resolves.toBeNull();
    });

    it("returns null on server errors, empty bodies and bad payloads", async () => {
      const responses = [new Response("oops", { status: 500 }), new Response("", { status: 200 }), jsonResponse(["not", "a", "contact"])];
      const fetchImpl = jest.fn<typeof fetch>(async () => responses.shift() ?? new Response("", { status: 404 }));
      const directory = new HttpClientDirectory({ baseUrl: "http://directory.test", fetchImpl });

      await expect(directory.lookup("1")).resolves.toBeNull();
      await expect(directory.lookup("1")).resolves.toBeNull();
      await expect(directory.lookup("1")).resolves.toBeNull();
    });

    it("returns null when the request fails", async () => {
      const fetchImpl = jest.fn<typeof fetch>(async () => {
        throw new TypeError("fetch failed");
      });
      const directory = new HttpClientDirectory({ baseUrl: "http://directory.test", fetchImpl });
      await expect(directory.lookup("573001234567")).resolves.toBeNull();
    });

    it("returns null when the contact carries no usable fields", async () => {
      const fetchImpl = jest.fn<typeof fetch>(async () => jsonResponse({ empresa: " ", telefono: "573001234567" }));
      const directory = new HttpClientDirectory({ baseUrl: "http://directory.test", fetchImpl });
      await expect(directory.lookup("573001234567")).resolves.toBeNull();
    });

    it("skips the request for user ids without digits", async () => {
      const fetchImpl = jest.fn<typeof fetch>(async () => jsonResponse({ empresa: "Acme" }));
      const directory = new HttpClientDirectory({ baseUrl: "http://directory.test", fetchImpl });
      await expect(directory.lookup("anonymous")).resolves.toBeNull();
      expect(fetchImpl).not.toHaveBeenCalled();
    });
  });
});
