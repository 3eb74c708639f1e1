import { expect, test } from "vitest";

import {
  CARD_TITLE,
  HALT_SIGN_IN_NOTICE,
  buildRolloutCard,
  formatIncreaseSentence,
} from "../src/core/card/build";

const baseInput = {
  packageName: "com.example.app",
  track: "production",
  releaseName: "1.2.0",
  from: 0.2,
  to: 0.5,
  increaseTime: "11 AM today",
};

test("formatIncreaseSentence renders both percentages and the time", () => {
  expect(formatIncreaseSentence(0.01, 0.2, "noon")).toBe(
    "The current staged release will automatically increase from 1% to 20% at noon."
  );
});

test("buildRolloutCard wraps an adaptive card in a Teams message", () => {
  const message = buildRolloutCard({ ...baseInput, haltActions: [] });

  expect(message.type).toBe("message");
  expect(message.attachments).toHaveLength(1);
  const [attachment] = message.attachments;
  expect(attachment.contentType).toBe("application/vnd.microsoft.card.adaptive");

  const card = attachment.content;
  expect(card.type).toBe("AdaptiveCard");
  expect(card.version).toBe("1.2");
  expect(card.actions).toEqual([]);
  expect(card.body).toHaveLength(4);
  expect(card.body[0]).toEqual({
    type: "TextBlock",
    size: "Medium",
    weight: "Bolder",
    text: "Bitrise",
  });
  expect(card.body[1]).toEqual({
    type: "ColumnSet",
    columns: [
      {
        type: "Column",
        items: [{ type: "TextBlock", weight: "Bolder", text: CARD_TITLE, wrap: true }],
        width: "stretch",
        verticalContentAlignment: "Center",
      },
    ],
  });
  expect(card.body[2]).toEqual({
    type: "TextBlock",
    text: "The current staged release will automatically increase from 20% to 50% at 11 AM today.",
    wrap: true,
  });
  expect(card.body[3]).toEqual({
    type: "FactSet",
    facts: [
      { title: "Package", value: "com.example.app" },
      { title: "Track", value: "production" },
      { title: "Release", value: "1.2.0" },
    ],
  });
});

test("buildRolloutCard adds halt buttons and the sign-in notice", () => {
  const message = buildRolloutCard({
    ...baseInput,
    releaseName: undefined,
    haltActions: [
      { title: "Halt app", url: "https://play.google.com/console/example" },
      {
        title: "Halt other app",
        url: "https://play.google.com/console/other",
        iconUrl: "https://example.com/icon.png",
      },
    ],
  });

  const card = message.attachments[0].content;
  expect(card.body).toHaveLength(5);
  expect(card.body[3]).toEqual({
    type: "FactSet",
    facts: [
      { title: "Package", value: "com.example.app" },
      { title: "Track", value: "production" },
    ],
  });
  expect(card.body[4]).toEqual({
    type: "TextBlock",
    text: HALT_SIGN_IN_NOTICE,
    wrap: true,
    isSubtle: true,
  });
  expect(card.actions).toEqual([
    {
      type: "Action.OpenUrl",
      title: "Halt app",
      url: "https://play.google.com/console/example",
      style: "destructive",
    },
    {
      type: "Action.OpenUrl",
      title: "Halt other app",
      url: "https://play.google.com/console/other",
      style: "destructive",
      iconUrl: "https://example.com/icon.png",
    },
  ]);
});
