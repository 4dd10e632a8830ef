export { registerUser, type AuthenticatedUserResult } from "./register-user";
export { loginUser } from "./login-user";
export { getOwnProfile, updateProfile, type ProfileResult } from "./profile";
export { changePassword, type ChangePasswordResult } from "./change-password";
export { listUsers, getUser, listSkills } from "./directory";
export { toOwnProfile, toPublicProfile } from "./profile-view";
