/**
 * Interactive flows: creating a config and picking one on first use
 */
import type { Activation, AddArgs, Profile, ProfileStore, Prompt, SessionState } from "../types";
import { APP_NAME } from "../constants";
import { ProfileError } from "../errors";
import { defaultNameFromUrl, toIdentifier } from "../profile/slug";
import { ensureUniqueSlug } from "../profile/resolve";
import { formatListLines } from "../profile/display";
import { addProfileToStore, appendProfile } from "../store/io";
import { activate, activateToken } from "../session/activate";
import { askWithDefault } from "./readline";

export const EMPTY_ADD_ARGS: AddArgs = { name: null, url: null, model: null, smallModel: null };

export interface AddResult {
    profile: Profile;
    store: ProfileStore;
}

export interface FirstUseResult {
    activation: Activation;
    store: ProfileStore;
}

async function answerOrAsk(prompt: Prompt, preset: string | null, question: string): Promise<string> {
    if (preset !== null) return preset.trim();
    return String(await prompt.ask(question)).trim();
}

export async function runInteractiveAdd(
    store: ProfileStore,
    storePath: string,
    prompt: Prompt,
    preset: AddArgs = EMPTY_ADD_ARGS
): Promise<AddResult> {
    console.error("Add a new Anthropic configuration");
    const token = String(
        await prompt.askSecret(`Enter auth token (will be stored in ${storePath}): `)
    ).trim();
    if (!token) {
        throw new ProfileError("Aborted: empty token.", "EmptyRequiredInput");
    }

    const url = await answerOrAsk(
        prompt,
        preset.url,
        "Enter base URL (e.g., https://api.anthropic.com or your proxy): "
    );
    if (!url) {
        throw new ProfileError("Aborted: empty base URL.", "EmptyRequiredInput");
    }

    const defaultName = defaultNameFromUrl(url);
    const name =
        preset.name !== null && preset.name.trim()
            ? preset.name.trim()
            : await askWithDefault(
                prompt,
                `Enter a short name for this config [${defaultName}]: `,
                defaultName
            );
    const slug = ensureUniqueSlug(toIdentifier(name), store.slugs);
    if (/^[0-9]+$/.test(slug)) {
        console.error(
            `Note: '${slug}' is all digits, so '${APP_NAME} use ${slug}' selects by index.`
        );
    }

    const model = await answerOrAsk(prompt, preset.model, "Default model (optional, leave blank): ");
    const smallFastModel = await answerOrAsk(
        prompt,
        preset.smallModel,
        "Small/fast model (optional, leave blank): "
    );

    const profile: Profile = { slug, baseUrl: url, authToken: token, model, smallFastModel };
    appendProfile(storePath, profile);
    console.error(`Saved config '${slug}'.`);
    return { profile, store: addProfileToStore(store, profile) };
}

/** Create a config when there are none, otherwise ask which one to use. */
export async function runFirstUse(
    store: ProfileStore,
    session: SessionState,
    storePath: string,
    prompt: Prompt
): Promise<FirstUseResult> {
    if (store.slugs.length === 0) {
        console.error("No configs found. Let's create one.");
        const added = await runInteractiveAdd(store, storePath, prompt);
        return {
            activation: activate(added.profile.slug, added.store, true),
            store: added.store,
        };
    }

    console.error("Select Anthropic config:");
    const activeSlug = session.selection ? session.selection.slug : null;
    for (const line of formatListLines(store, activeSlug)) console.error(line);
    const fallback = String(
        session.selection && session.selection.index ? session.selection.index : 1
    );
    const choice = await askWithDefault(prompt, `Enter index or name [${fallback}]: `, fallback);
    return { activation: activateToken(choice, store, true), store };
}
