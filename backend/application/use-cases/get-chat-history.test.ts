import { describe, expect, it, vi } from "vitest";

import { InMemoryChatHistoryRepository } from "@/backend/adapters/db/memory/chat-history-repository";
import { ValidationError } from "@/backend/application/errors";
import { GetChatHistoryUseCase } from "@/backend/application/use-cases/get-chat-history";

describe("GetChatHistoryUseCase", () => {
  it("returns an empty list for unknown users", async () => {
    const useCase = new GetChatHistoryUseCase(new InMemoryChatHistoryRepository());

    expect(await useCase.execute("stranger")).toEqual([]);
  });

  it("keeps users apart", async () => {
    const repository = new InMemoryChatHistoryRepository();
    await repository.append({ userId: "alice", role: "user", content: "mine" });
    await repository.append({ userId: "bob", role: "user", content: "theirs" });

    const history = await new GetChatHistoryUseCase(repository).execute("alice");

    expect(history.map((message) => message.content)).toEqual(["mine"]);
  });

  it("uses the recent query when a limit is given", async () => {
    const repository = new InMemoryChatHistoryRepository();
    const listRecent = vi.spyOn(repository, "listRecentForUser");
    for (const content of ["1", "2", "3"]) {
      await repository.append({ userId: "u1", role: "user", content });
    }

    const history = await new GetChatHistoryUseCase(repository).execute("u1", { limit: 2 });

    expect(listRecent).toHaveBeenCalledWith("u1", 2);
    expect(history.map((message) => message.content)).toEqual(["2", "3"]);
  });

  it("rejects invalid limits and empty user ids", async () => {
    const useCase = new GetChatHistoryUseCase(new InMemoryChatHistoryRepository());

    await expect(useCase.execute("u1", { limit: 0 })).rejects.toThrow(
      "History limit must be a positive integer",
    );
    await expect(useCase.execute("u1", { limit: 1.5 })).rejects.toBeInstanceOf(ValidationError);
    await expect(useCase.execute("")).rejects.toThrow("User id must not be empty");
  });
});
