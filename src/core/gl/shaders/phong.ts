/**
 * Phong shader for the tabletop scene: one directional light, a fixed array of
 * point lights and a camera-mounted spot light, with either a flat object
 * color or a tiled texture as the base color.
 */

import type { ShaderSources } from '../ShaderProgram';

export const MAX_POINT_LIGHTS = 5;

const vertex = `#version 300 es
layout(location = 0) in vec3 aPosition;
layout(location = 1) in vec3 aNormal;
layout(location = 2) in vec2 aTexCoord;

uniform mat4 model;
uniform mat4 view;
uniform mat4 projection;

out vec3 vFragPosition;
out vec3 vNormal;
out vec2 vTexCoord;

void main() {
  vec4 worldPosition = model * vec4(aPosition, 1.0);
  vFragPosition = worldPosition.xyz;
  vNormal = mat3(transpose(inverse(model))) * aNormal;
  vTexCoord = aTexCoord;
  gl_Position = projection * view * worldPosition;
}`;

const fragment = `#version 300 es
precision highp float;

#define MAX_POINT_LIGHTS ${MAX_POINT_LIGHTS}

struct Material {
  vec3 diffuseColor;
  vec3 specularColor;
  float shininess;
};

struct DirectionalLight {
  vec3 direction;
  vec3 ambient;
  vec3 diffuse;
  vec3 specular;
  bool bActive;
};

struct PointLight {
  vec3 position;
  vec3 ambient;
  vec3 diffuse;
  vec3 specular;
  bool bActive;
};

struct SpotLight {
  vec3 position;
  vec3 direction;
  vec3 ambient;
  vec3 diffuse;
  vec3 specular;
  float constant;
  float linear;
  float quadratic;
  float cutOff;
  float outerCutOff;
  bool bActive;
};

in vec3 vFragPosition;
in vec3 vNormal;
in vec2 vTexCoord;

uniform bool bUseTexture;
uniform bool bUseLighting;
uniform vec4 objectColor;
uniform sampler2D objectTexture;
uniform vec2 UVscale;
uniform vec3 viewPosition;
uniform Material material;
uniform DirectionalLight directionalLight;
uniform PointLight pointLights[MAX_POINT_LIGHTS];
uniform SpotLight spotLight;

out vec4 fragColor;

vec3 phong(vec3 lightDir, vec3 ambient, vec3 diffuse, vec3 specular, vec3 normal, vec3 viewDir) {
  float diff = max(dot(normal, lightDir), 0.0);
  vec3 reflectDir = reflect(-lightDir, normal);
  float spec = pow(max(dot(viewDir, reflectDir), 0.0), max(material.shininess, 0.001));
  return ambient * material.diffuseColor
    + diffuse * diff * material.diffuseColor
    + specular * spec * material.specularColor;
}

void main() {
  vec4 baseColor = bUseTexture ? texture(objectTexture, vTexCoord * UVscale) : objectColor;

  if (!bUseLighting) {
    fragColor = baseColor;
    return;
  }

  vec3 normal = normalize(vNormal);
  vec3 viewDir = normalize(viewPosition - vFragPosition);
  vec3 lighting = vec3(0.0);

  if (directionalLight.bActive) {
    lighting += phong(normalize(-directionalLight.direction), directionalLight.ambient,
      directionalLight.diffuse, directionalLight.specular, normal, viewDir);
  }

  for (int i = 0; i < MAX_POINT_LIGHTS; i++) {
    if (!pointLights[i].bActive) continue;
    vec3 lightDir = normalize(pointLights[i].position - vFragPosition);
    lighting += phong(lightDir, pointLights[i].ambient, pointLights[i].diffuse,
      pointLights[i].specular, normal, viewDir);
  }

  if (spotLight.bActive) {
    vec3 lightDir = normalize(spotLight.position - vFragPosition);
    float theta = dot(lightDir, normalize(-spotLight.direction));
    float epsilon = spotLight.cutOff - spotLight.outerCutOff;
    float intensity = clamp((theta - spotLight.outerCutOff) / epsilon, 0.0, 1.0);
    float distance = length(spotLight.position - vFragPosition);
    float attenuation = 1.0 / (spotLight.constant + spotLight.linear * distance
      + spotLight.quadratic * distance * distance);
    lighting += phong(lightDir, spotLight.ambient, spotLight.diffuse * intensity,
      spotLight.specular * intensity, normal, viewDir) * attenuation;
  }

  fragColor = vec4(lighting * baseColor.rgb, baseColor.a);
}`;

export const PHONG_SHADER: ShaderSources = { vertex, fragment };
