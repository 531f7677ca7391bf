/*
 * Matrix IDs:
 * User ID    : @user:domain.org
 * Room Alias : #room:domain.org
 * Room ID    : !1234ASDFGH:domain.org
 *
 */

type UserID    = `@${string}`;

/* Strict, must always be a valid room id */
type RoomID    = `!${string}`;

/* Only ever a published alias, never a room id */
type RoomAlias = `#${string}`;
